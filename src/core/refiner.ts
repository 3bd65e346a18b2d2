import { ReadmeError, TruncatedOutputError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  DEFAULT_FALLBACK_MAX_TOKENS,
  type CompletionClient,
  type CompletionOptions,
} from "./completion.js";
import {
  extractPreamble,
  mergeSections,
  normalizeHeading,
  splitSections,
  splitTopLevelChunks,
} from "./markdown.js";
import {
  buildChunkRefinePrompt,
  buildClassifyPrompt,
  buildRefinePrompt,
  buildSectionRefinePrompt,
} from "./prompts.js";
import type {
  RefinementAttempt,
  RefinementResult,
  RefinementTier,
} from "./types.js";

export const REFINEMENT_NOTE =
  "This README requires further refinement based on the feedback above.";

export interface ReadmeRefinerOptions {
  logger?: Logger;
  /** Token ceiling for the high-budget tier. */
  fallbackMaxTokens?: number;
}

interface RefinementStrategy {
  tier: RefinementTier;
  run(content: string, feedback: string): Promise<string>;
}

export function looksTruncated(text: string): boolean {
  const trimmed = text.trimEnd();
  return trimmed.endsWith("...") || trimmed.endsWith("…");
}

/** Terminal fallback: the untouched document with the feedback attached. */
export function minimalRefinement(content: string, feedback: string): string {
  const note = [
    "<!--",
    "Feedback received:",
    feedback.replaceAll("-->", "-- >"),
    "",
    REFINEMENT_NOTE,
    "-->",
  ].join("\n");
  return `${note}\n\n${content}`;
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^["'`]+|["'`.]+$/g, "").trim();
}

export function parseSectionList(classification: string): string[] {
  const names = classification.split(",").map(stripQuotes).filter(Boolean);
  return [...new Set(names)];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Applies free-text feedback to a README. Strategies are tried in order
 * (standard, high-budget, targeted) and the first one that succeeds wins;
 * when all fail the original is returned with the feedback attached, so
 * refine() never rejects.
 */
export class ReadmeRefiner {
  private readonly logger: Logger;
  private readonly fallbackMaxTokens: number;
  private readonly strategies: readonly RefinementStrategy[];

  constructor(
    private readonly client: CompletionClient,
    options: ReadmeRefinerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.fallbackMaxTokens = options.fallbackMaxTokens ?? DEFAULT_FALLBACK_MAX_TOKENS;
    this.strategies = [
      {
        tier: "standard",
        run: (c, f) => this.refineWhole(c, f, { rejectTruncated: true }),
      },
      {
        tier: "high-budget",
        run: (c, f) =>
          this.refineWhole(c, f, {
            maxTokens: this.fallbackMaxTokens,
            rejectTruncated: true,
          }),
      },
      { tier: "targeted", run: (c, f) => this.refineTargeted(c, f) },
    ];
  }

  async refine(content: string, feedback: string): Promise<RefinementResult> {
    const attempts: RefinementAttempt[] = [];

    for (const strategy of this.strategies) {
      try {
        const refined = await strategy.run(content, feedback);
        attempts.push({ tier: strategy.tier, ok: true, content: refined });
        this.logger.debug(`README refined with the ${strategy.tier} strategy`);
        return { content: refined, tier: strategy.tier, attempts };
      } catch (err) {
        const error = toError(err);
        attempts.push({ tier: strategy.tier, ok: false, error });
        this.logger.warn(`${strategy.tier} refinement failed: ${error.message}`);
      }
    }

    this.logger.warn("Every refinement strategy failed, attaching the feedback as a note");
    return {
      content: minimalRefinement(content, feedback),
      tier: "minimal",
      attempts,
    };
  }

  private async refineWhole(
    content: string,
    feedback: string,
    options: CompletionOptions,
  ): Promise<string> {
    const refined = await this.client.complete(
      buildRefinePrompt(content, feedback),
      options,
    );

    if (looksTruncated(refined)) {
      throw new TruncatedOutputError("Refined README appears to be truncated");
    }
    return refined;
  }

  private async refineTargeted(content: string, feedback: string): Promise<string> {
    const classification = stripQuotes(
      await this.client.complete(buildClassifyPrompt(feedback)),
    );

    if (classification.toUpperCase() == "ALL") {
      const refinedChunks: string[] = [];
      for (const chunk of splitTopLevelChunks(content)) {
        refinedChunks.push(
          await this.client.complete(buildChunkRefinePrompt(chunk, feedback)),
        );
      }
      return refinedChunks.join("\n\n");
    }

    const sections = splitSections(content);
    if (sections.size == 0) {
      throw new ReadmeError("README has no headings to refine section by section");
    }

    for (const name of parseSectionList(classification)) {
      const key = normalizeHeading(name);
      const body = sections.get(key);
      if (body === undefined) {
        this.logger.debug(`No section named "${name}", skipping`);
        continue;
      }
      sections.set(
        key,
        await this.client.complete(buildSectionRefinePrompt(name, body, feedback)),
      );
    }

    return extractPreamble(content) + mergeSections(sections);
  }
}
