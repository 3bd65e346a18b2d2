import { describe, it, expect, vi } from "vitest";
import type { CompletionOptions } from "../src/core/completion.js";
import { DEFAULT_FALLBACK_MAX_TOKENS } from "../src/core/completion.js";
import { buildRefinePrompt } from "../src/core/prompts.js";
import {
  REFINEMENT_NOTE,
  ReadmeRefiner,
  looksTruncated,
  minimalRefinement,
  parseSectionList,
} from "../src/core/refiner.js";
import { ProviderError, TruncatedOutputError } from "../src/errors.js";

function mockComplete() {
  return vi.fn<(prompt: string, options?: CompletionOptions) => Promise<string>>();
}

const DOC = "Intro line\n\n## Installation\nold steps\n\n## Usage\nrun it";

describe("looksTruncated", () => {
  it("flags trailing ellipses", () => {
    expect(looksTruncated("text...")).toBe(true);
    expect(looksTruncated("text…\n")).toBe(true);
    expect(looksTruncated("text.")).toBe(false);
  });
});

describe("parseSectionList", () => {
  it("splits, strips quotes and dedupes", () => {
    expect(parseSectionList('"Installation", Usage., Installation')).toEqual([
      "Installation",
      "Usage",
    ]);
  });
});

describe("minimalRefinement", () => {
  it("prepends the feedback as an HTML comment", () => {
    expect(minimalRefinement("# Doc", "add examples")).toBe(
      `<!--\nFeedback received:\nadd examples\n\n${REFINEMENT_NOTE}\n-->\n\n# Doc`,
    );
  });

  it("cannot close the comment early", () => {
    expect(minimalRefinement("# Doc", "a --> b")).toContain("Feedback received:\na -- > b\n");
  });
});

describe("ReadmeRefiner", () => {
  it("returns the standard rewrite when it succeeds", async () => {
    const complete = mockComplete().mockResolvedValueOnce("# Better");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(DOC, "be concise");

    expect(result.content).toBe("# Better");
    expect(result.tier).toBe("standard");
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith(buildRefinePrompt(DOC, "be concise"), {
      rejectTruncated: true,
    });
  });

  it("escalates to the high-budget tier when output is truncated", async () => {
    const complete = mockComplete()
      .mockResolvedValueOnce("# Better but cut...")
      .mockResolvedValueOnce("# Better and complete");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(DOC, "be concise");

    expect(result.tier).toBe("high-budget");
    expect(result.content).toBe("# Better and complete");
    expect(complete.mock.calls[1][1]).toEqual({
      maxTokens: DEFAULT_FALLBACK_MAX_TOKENS,
      rejectTruncated: true,
    });
    expect(result.attempts.map((a) => [a.tier, a.ok])).toEqual([
      ["standard", false],
      ["high-budget", true],
    ]);
  });

  it("escalates when the client reports a token-limit stop", async () => {
    const complete = mockComplete()
      .mockRejectedValueOnce(new TruncatedOutputError("stopped at the limit"))
      .mockResolvedValueOnce("# Complete");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(DOC, "be concise");

    expect(result.tier).toBe("high-budget");
    expect(result.attempts[0]).toMatchObject({ tier: "standard", ok: false });
  });

  it("uses the configured fallback budget", async () => {
    const complete = mockComplete()
      .mockRejectedValueOnce(new ProviderError("timeout"))
      .mockResolvedValueOnce("# Done");
    const refiner = new ReadmeRefiner({ complete }, { fallbackMaxTokens: 16000 });

    await refiner.refine(DOC, "feedback");

    expect(complete.mock.calls[1][1]).toEqual({ maxTokens: 16000, rejectTruncated: true });
  });

  it("refines only the named sections in the targeted tier", async () => {
    const complete = mockComplete()
      .mockResolvedValueOnce("cut...")
      .mockResolvedValueOnce("cut again…")
      .mockResolvedValueOnce('"Installation".')
      .mockResolvedValueOnce("## Installation\nnew steps");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(DOC, "fix the install steps");

    expect(result.tier).toBe("targeted");
    expect(result.content).toBe("Intro line\n\n## Installation\nnew steps\n\n## Usage\nrun it");
    expect(complete.mock.calls[3][0]).toContain("Section: Installation\n```markdown\n## Installation\nold steps\n```");
  });

  it("skips section names that are not in the document", async () => {
    const complete = mockComplete()
      .mockRejectedValueOnce(new ProviderError("boom"))
      .mockRejectedValueOnce(new ProviderError("boom"))
      .mockResolvedValueOnce("Troubleshooting, Usage")
      .mockResolvedValueOnce("## Usage\nrun it faster");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(DOC, "usage is slow");

    expect(complete).toHaveBeenCalledTimes(4);
    expect(result.content).toBe("Intro line\n\n## Installation\nold steps\n\n## Usage\nrun it faster");
  });

  it("finds sections written with closing hashes", async () => {
    const doc = "## Installation ##\nold steps\n\n## Usage ##\nrun it";
    const complete = mockComplete()
      .mockRejectedValueOnce(new ProviderError("boom"))
      .mockRejectedValueOnce(new ProviderError("boom"))
      .mockResolvedValueOnce("Usage")
      .mockResolvedValueOnce("## Usage\nrun it faster");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(doc, "usage is slow");

    expect(result.tier).toBe("targeted");
    expect(result.content).toBe("## Installation ##\nold steps\n\n## Usage\nrun it faster");
  });

  it("refines every top-level chunk when the feedback is general", async () => {
    const doc = "# A\nalpha\n# B\nbeta";
    const complete = mockComplete()
      .mockRejectedValueOnce(new ProviderError("boom"))
      .mockRejectedValueOnce(new ProviderError("boom"))
      .mockResolvedValueOnce("ALL")
      .mockResolvedValueOnce("# A\nALPHA")
      .mockResolvedValueOnce("# B\nBETA");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine(doc, "shout");

    expect(result.tier).toBe("targeted");
    expect(result.content).toBe("# A\nALPHA\n\n# B\nBETA");
  });

  it("falls back to the annotated original when every tier fails", async () => {
    const complete = mockComplete().mockRejectedValue(new ProviderError("offline"));
    const warn = vi.fn();
    const refiner = new ReadmeRefiner(
      { complete },
      { logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() } },
    );

    const result = await refiner.refine(DOC, "anything");

    expect(result.tier).toBe("minimal");
    expect(result.content).toBe(minimalRefinement(DOC, "anything"));
    expect(result.attempts.map((a) => a.tier)).toEqual(["standard", "high-budget", "targeted"]);
    expect(result.attempts.every((a) => !a.ok)).toBe(true);
    expect(warn).toHaveBeenCalledWith("standard refinement failed: offline");
  });

  it("falls back when a document without headings gets a named-section classification", async () => {
    const complete = mockComplete()
      .mockResolvedValueOnce("cut...")
      .mockResolvedValueOnce("cut...")
      .mockResolvedValueOnce("Usage");
    const refiner = new ReadmeRefiner({ complete });

    const result = await refiner.refine("plain text only", "improve usage");

    expect(result.tier).toBe("minimal");
    expect(result.content).toBe(minimalRefinement("plain text only", "improve usage"));
  });
});
