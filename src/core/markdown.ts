import type { MarkdownSectionMap } from "./types.js";

const HEADING_LINE = /^(#+)(.*)$/;
const FENCE_LINE = /^ {0,3}(`{3,}|~{3,})/;

/** Post-filter output shorter than this is considered over-aggressive. */
export const MIN_FILTERED_LINES = 5;

interface HeadingLine {
  index: number;
  level: number;
  text: string;
}

/**
 * Heading key used by split, lookup and the post-filter alike: opening
 * and closing markers stripped, whitespace collapsed, lowercased.
 */
export function normalizeHeading(text: string): string {
  return text
    .replace(/^\s*#+/, "")
    .replace(/\s+#+\s*$/, "")
    .trim()
    .replace(/\s+/g, " ")
    .toLowerCase();
}

// Lines inside fenced code blocks never count as headings, so shell
// comments in install snippets stay in their section.
function scanHeadings(lines: string[]): HeadingLine[] {
  const headings: HeadingLine[] = [];
  let openFence: string | null = null;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const fence = FENCE_LINE.exec(line);
    if (fence) {
      const marker = fence[1].charAt(0);
      if (openFence === null) {
        openFence = marker;
      } else if (openFence === marker) {
        openFence = null;
      }
      continue;
    }
    if (openFence !== null) continue;

    const heading = HEADING_LINE.exec(line);
    if (heading) {
      headings.push({ index, level: heading[1].length, text: heading[2] });
    }
  }

  return headings;
}

function uniqueKey(sections: MarkdownSectionMap, key: string): string {
  if (!sections.has(key)) return key;
  let n = 2;
  while (sections.has(`${key} (${n})`)) n++;
  return `${key} (${n})`;
}

/**
 * Decompose a document into heading → body, in document order. Each body
 * starts with its own heading line. The single blank line separating a
 * section from the next one is dropped so that mergeSections restores it.
 * Text before the first heading is not part of the map; a document
 * without headings yields an empty map.
 */
export function splitSections(document: string): MarkdownSectionMap {
  const lines = document.split("\n");
  const headings = scanHeadings(lines);
  const sections: MarkdownSectionMap = new Map();

  headings.forEach((heading, i) => {
    const next = headings[i + 1];
    let body = lines.slice(heading.index, next ? next.index : lines.length).join("\n");
    if (next && body.endsWith("\n")) {
      body = body.slice(0, -1);
    }
    sections.set(uniqueKey(sections, normalizeHeading(heading.text)), body);
  });

  return sections;
}

export function mergeSections(sections: MarkdownSectionMap): string {
  return [...sections.values()].join("\n\n");
}

/** Raw text before the first heading, separator included. */
export function extractPreamble(document: string): string {
  const lines = document.split("\n");
  const [first] = scanHeadings(lines);
  if (!first) return document;
  if (first.index == 0) return "";
  return lines.slice(0, first.index).join("\n") + "\n";
}

/**
 * Split at every top-level `# ` heading. Anything before the first one is
 * its own leading chunk. Chunks are trimmed and empty ones dropped.
 */
export function splitTopLevelChunks(document: string): string[] {
  const lines = document.split("\n");
  const boundaries = scanHeadings(lines)
    .filter((h) => h.level == 1 && h.text.startsWith(" "))
    .map((h) => h.index);

  if (boundaries.length == 0) return [document];
  if (boundaries[0] > 0) boundaries.unshift(0);

  const chunks: string[] = [];
  boundaries.forEach((start, i) => {
    const end = boundaries[i + 1] ?? lines.length;
    const chunk = lines.slice(start, end).join("\n").trim();
    if (chunk) chunks.push(chunk);
  });
  return chunks;
}

export function headingMatches(heading: string, requested: readonly string[]): boolean {
  return requested.some((name) => name.includes(heading) || heading.includes(name));
}

/**
 * Keep only heading blocks whose text loosely matches a requested section
 * name (substring either way). A matching heading always opens a kept
 * block, whatever its level; a deeper heading that does not match follows
 * the block it sits in. Returns null when fewer than MIN_FILTERED_LINES
 * lines would survive.
 */
export function filterToRequestedSections(
  content: string,
  requestedNames: readonly string[],
): string | null {
  const requested = requestedNames.map(normalizeHeading);
  const lines = content.split("\n");
  const headingAt = new Map(scanHeadings(lines).map((h) => [h.index, h]));

  const kept: string[] = [];
  let include = true;
  let decidingLevel = 0;

  lines.forEach((line, index) => {
    const heading = headingAt.get(index);
    if (heading) {
      const matches = headingMatches(normalizeHeading(heading.text), requested);
      if (matches || decidingLevel == 0 || heading.level <= decidingLevel) {
        decidingLevel = heading.level;
        include = matches;
      }
    }
    if (include) kept.push(line);
  });

  if (kept.length < MIN_FILTERED_LINES) return null;
  return kept.join("\n");
}
