import { SECTION_CATALOG } from "../constants.js";
import { normalizeHeading } from "./markdown.js";
import type { SectionDescriptor } from "./types.js";

export interface ResolvedSections {
  sections: SectionDescriptor[];
  unknown: string[];
}

function matches(section: SectionDescriptor, requested: string): boolean {
  const key = normalizeHeading(requested);
  return section.id == key || normalizeHeading(section.name) == key;
}

/**
 * Catalogue entries named by id or display name (case-insensitive), in
 * catalogue order. Names that match nothing are reported, not guessed.
 */
export function resolveSections(
  requested: readonly string[],
  catalog: readonly SectionDescriptor[] = SECTION_CATALOG,
): ResolvedSections {
  const sections = catalog.filter((section) =>
    requested.some((name) => matches(section, name)),
  );
  const unknown = requested.filter(
    (name) => !catalog.some((section) => matches(section, name)),
  );
  return { sections, unknown };
}

export function sectionIds(sections: readonly SectionDescriptor[]): string[] {
  return sections.map((s) => s.id);
}
