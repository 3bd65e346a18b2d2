import { PROJECT_STRUCTURE_SECTION } from "../constants.js";
import { GenerationError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { mapWithConcurrency } from "../utils.js";
import type { CompletionClient } from "./completion.js";
import { filterToRequestedSections, normalizeHeading } from "./markdown.js";
import {
  buildHeaderPrompt,
  buildImprovementFeedback,
  buildSectionPrompt,
} from "./prompts.js";
import { ReadmeRefiner } from "./refiner.js";
import type {
  GenerationResult,
  RepositoryInfo,
  SectionDescriptor,
  SectionOutcome,
} from "./types.js";

export const FAILED_SECTION_NOTE = "*Content generation failed for this section.*";
export const MISSING_STRUCTURE_NOTE = "*File structure not available.*";

export interface ReadmeGeneratorOptions {
  logger?: Logger;
  /** Section calls allowed in flight at once. Output order is unaffected. */
  concurrency?: number;
  /** Used when an existing README is improved instead of regenerated. */
  refiner?: ReadmeRefiner;
}

export function sortSections(
  sections: readonly SectionDescriptor[],
): SectionDescriptor[] {
  // Array.prototype.sort is stable, so equal orders keep input order.
  return [...sections].sort((a, b) => a.order - b.order);
}

export function failedSectionBody(section: SectionDescriptor): string {
  return `## ${section.name}\n\n${FAILED_SECTION_NOTE}`;
}

export function projectStructureBody(
  section: SectionDescriptor,
  repo: RepositoryInfo,
): string {
  if (!repo.fileStructure) {
    return `## ${section.name}\n\n${MISSING_STRUCTURE_NOTE}`;
  }
  return `## ${section.name}\n\n\`\`\`\n${repo.fileStructure}\n\`\`\``;
}

function renderOutcome(outcome: SectionOutcome): string {
  return outcome.status == "ok" ? outcome.body : failedSectionBody(outcome.section);
}

/**
 * Writes a README one section at a time: a header call, then one call per
 * requested section in `order`. A failed section becomes a visible
 * placeholder; only a failed header aborts the run.
 */
export class ReadmeGenerator {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly refiner: ReadmeRefiner;

  constructor(
    private readonly client: CompletionClient,
    options: ReadmeGeneratorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.refiner =
      options.refiner ?? new ReadmeRefiner(client, { logger: this.logger });
  }

  async generate(
    repo: RepositoryInfo,
    sections: readonly SectionDescriptor[],
    existingReadme?: string,
  ): Promise<GenerationResult> {
    const ordered = sortSections(sections);
    const sectionsGenerated = ordered.map((s) => s.name);

    if (existingReadme !== undefined) {
      this.logger.info("Existing README found, improving it instead of starting over");
      const feedback = buildImprovementFeedback(repo, ordered);
      const refined = await this.refiner.refine(existingReadme, feedback);
      return { content: refined.content, sectionsGenerated, optimization: true };
    }

    const header = await this.generateHeader(repo);

    const outcomes = await mapWithConcurrency(ordered, this.concurrency, (section) =>
      this.generateSection(section, repo, sections),
    );

    const body = outcomes.map(renderOutcome).join("\n\n");
    const filtered = filterToRequestedSections(body, sectionsGenerated);
    if (filtered === null) {
      this.logger.warn(
        "Section filtering left very little content, keeping the unfiltered sections",
      );
    }

    return {
      content: [header, filtered ?? body].join("\n\n"),
      sectionsGenerated,
      optimization: false,
    };
  }

  private async generateHeader(repo: RepositoryInfo): Promise<string> {
    try {
      return await this.client.complete(buildHeaderPrompt(repo));
    } catch (err) {
      throw new GenerationError("Failed to generate the README header.", errorMessage(err));
    }
  }

  async generateSection(
    section: SectionDescriptor,
    repo: RepositoryInfo,
    allSections: readonly SectionDescriptor[],
  ): Promise<SectionOutcome> {
    if (normalizeHeading(section.name) == PROJECT_STRUCTURE_SECTION) {
      return { status: "ok", section, body: projectStructureBody(section, repo) };
    }

    this.logger.debug(`Generating section "${section.name}"`);
    try {
      const body = await this.client.complete(
        buildSectionPrompt(section, repo, allSections),
      );
      return { status: "ok", section, body };
    } catch (err) {
      this.logger.warn(`Failed to generate section "${section.name}": ${errorMessage(err)}`);
      return {
        status: "failed",
        section,
        error: err instanceof Error ? err : new Error(String(err)),
      };
    }
  }
}
