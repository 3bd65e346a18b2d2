import { describe, it, expect } from "vitest";
import {
  extractPreamble,
  filterToRequestedSections,
  headingMatches,
  mergeSections,
  normalizeHeading,
  splitSections,
  splitTopLevelChunks,
} from "../src/core/markdown.js";

describe("normalizeHeading", () => {
  it("strips markers, collapses whitespace and lowercases", () => {
    expect(normalizeHeading("##   Getting   Started  ")).toBe("getting started");
    expect(normalizeHeading(" Usage")).toBe("usage");
  });

  it("strips closing hashes but not a trailing hash in the title", () => {
    expect(normalizeHeading("## Usage ##")).toBe("usage");
    expect(normalizeHeading(" Usage  #  ")).toBe("usage");
    expect(normalizeHeading(" C#")).toBe("c#");
  });
});

describe("splitSections", () => {
  it("keys sections by normalized heading in document order", () => {
    const doc = "# Intro\nHello\n\n## Usage\nRun it\n\n## License\nMIT";
    const sections = splitSections(doc);

    expect([...sections.keys()]).toEqual(["intro", "usage", "license"]);
    expect(sections.get("intro")).toBe("# Intro\nHello");
    expect(sections.get("usage")).toBe("## Usage\nRun it");
    expect(sections.get("license")).toBe("## License\nMIT");
  });

  it("round-trips a document that starts with a heading", () => {
    const doc = "# Title\n\nText\n\n## A\n- one\n- two\n\n## B\nLast line\n";
    expect(mergeSections(splitSections(doc))).toBe(doc);
  });

  it("treats any run of # at line start as a heading", () => {
    const sections = splitSections("#Tight\nbody\n\n###### Deep\nmore");
    expect([...sections.keys()]).toEqual(["tight", "deep"]);
  });

  it("ignores # lines inside fenced code blocks", () => {
    const doc = "## Install\n```bash\n# install deps\nnpm install\n```\n\n## Usage\nGo";
    const sections = splitSections(doc);

    expect([...sections.keys()]).toEqual(["install", "usage"]);
    expect(sections.get("install")).toBe("## Install\n```bash\n# install deps\nnpm install\n```");
  });

  it("returns an empty map when there are no headings", () => {
    expect(splitSections("just text\nno headings").size).toBe(0);
  });

  it("suffixes duplicate headings instead of overwriting them", () => {
    const sections = splitSections("## Notes\nfirst\n\n## Notes\nsecond");
    expect([...sections.keys()]).toEqual(["notes", "notes (2)"]);
    expect(sections.get("notes (2)")).toBe("## Notes\nsecond");
  });

  it("leaves the preamble out of the map", () => {
    const sections = splitSections("Preface\n\n## Usage\nRun");
    expect([...sections.keys()]).toEqual(["usage"]);
  });
});

describe("extractPreamble", () => {
  it("returns the text before the first heading", () => {
    expect(extractPreamble("Preface\n\n## Usage\nRun")).toBe("Preface\n\n");
  });

  it("is empty when the document starts with a heading", () => {
    expect(extractPreamble("# Title\ntext")).toBe("");
  });

  it("is the whole document when there are no headings", () => {
    expect(extractPreamble("no headings here")).toBe("no headings here");
  });
});

describe("splitTopLevelChunks", () => {
  it("splits at level-1 headings and keeps a leading chunk", () => {
    const doc = "badge line\n# One\nalpha\n## Sub\nbeta\n# Two\ngamma\n";
    expect(splitTopLevelChunks(doc)).toEqual([
      "badge line",
      "# One\nalpha\n## Sub\nbeta",
      "# Two\ngamma",
    ]);
  });

  it("returns the whole document when there is no level-1 heading", () => {
    const doc = "## Only\ntext";
    expect(splitTopLevelChunks(doc)).toEqual([doc]);
  });

  it("drops empty chunks", () => {
    expect(splitTopLevelChunks("\n\n# A\n\n# B\nb")).toEqual(["# A", "# B\nb"]);
  });
});

describe("headingMatches", () => {
  it("matches on substrings in either direction", () => {
    expect(headingMatches("installation", ["install"])).toBe(true);
    expect(headingMatches("usage", ["usage examples"])).toBe(true);
    expect(headingMatches("license", ["usage"])).toBe(false);
  });
});

describe("filterToRequestedSections", () => {
  const doc = [
    "## Introduction",
    "What it does.",
    "",
    "## Installation",
    "npm install",
    "### From source",
    "git clone",
    "",
    "## Sponsors",
    "Thanks!",
  ].join("\n");

  it("drops unrequested sections and keeps nested headings with their parent", () => {
    const filtered = filterToRequestedSections(doc, ["Introduction", "Installation"]);
    expect(filtered).toBe(
      [
        "## Introduction",
        "What it does.",
        "",
        "## Installation",
        "npm install",
        "### From source",
        "git clone",
        "",
      ].join("\n"),
    );
  });

  it("keeps lines before the first heading", () => {
    const filtered = filterToRequestedSections(`Lead\n${doc}`, ["Introduction", "Installation"]);
    expect(filtered?.split("\n")[0]).toBe("Lead");
  });

  it("keeps a requested section that follows a stray shallower heading", () => {
    const stray = [
      "## Introduction",
      "Text.",
      "",
      "# Example output",
      "foo",
      "",
      "## Installation",
      "npm install",
      "",
      "## Sponsors",
      "Thanks!",
    ].join("\n");

    expect(filterToRequestedSections(stray, ["Introduction", "Installation"])).toBe(
      ["## Introduction", "Text.", "", "## Installation", "npm install", ""].join("\n"),
    );
  });

  it("returns null when too little survives", () => {
    expect(filterToRequestedSections(doc, ["Sponsors"])).toBeNull();
  });
});
