import path from "node:path";
import fs from "node:fs/promises";
import * as clack from "@clack/prompts";
import chalk from "chalk";
import { analyzeRepository, findExistingReadme } from "../core/analyzer.js";
import { resolveSections } from "../core/sections.js";
import type { SectionDescriptor } from "../core/types.js";
import { ReadmeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { fileExists, readTextFile } from "../utils.js";
import { createCommandContext } from "./context.js";
import { confirmOverwrite, makeSectionSelection } from "./helpers.js";

export interface GenerateFlags {
  path: string;
  output?: string;
  sections: string[];
  noInteractive: boolean;
  overwrite: boolean;
  improve: boolean;
  concurrency?: number;
  verbose: boolean;
}

function sectionsFromNames(names: readonly string[], logger: Logger): SectionDescriptor[] {
  const { sections, unknown } = resolveSections(names);
  if (unknown.length > 0) {
    logger.warn(`Ignoring unknown sections: ${unknown.join(", ")}`);
  }
  return sections;
}

export async function generateCommand(flags: GenerateFlags): Promise<void> {
  const interactive = !flags.noInteractive;
  clack.intro(chalk.green.bold("readmesmith"));

  const { config, logger, generator } = await createCommandContext({
    verbose: flags.verbose,
    interactive,
    concurrency: flags.concurrency,
  });

  const root = path.resolve(flags.path);
  const outputName = flags.output ?? config.outputFileName;
  const outputPath = path.join(root, outputName);

  let existingReadme: string | undefined;
  if (flags.improve) {
    const existing = fileExists(outputPath)
      ? { path: outputPath, content: await readTextFile(outputPath) }
      : await findExistingReadme(root);
    if (existing?.content) {
      logger.info(`Improving ${path.relative(root, existing.path) || existing.path}`);
      existingReadme = existing.content;
    } else {
      logger.warn("No existing README to improve, generating a new one");
    }
  } else if (fileExists(outputPath) && !flags.overwrite) {
    if (!interactive) {
      logger.warn(`${outputName} already exists. Use --overwrite to replace it.`);
      return;
    }
    if (!(await confirmOverwrite(outputName))) {
      clack.outro(chalk.yellow("Generation cancelled."));
      return;
    }
  }

  const spinner = clack.spinner();
  spinner.start(`Analyzing ${root}`);
  const repo = await analyzeRepository(root, { logger }).catch((err: unknown) => {
    spinner.stop("Analysis failed", 1);
    throw err;
  });
  spinner.stop(`Analyzed ${chalk.green(repo.name)} (${chalk.blue(repo.language ?? "Unknown")})`);

  let sections: SectionDescriptor[];
  if (flags.sections.length > 0) {
    sections = sectionsFromNames(flags.sections, logger);
  } else if (interactive) {
    sections = await makeSectionSelection(config.defaultSections);
  } else {
    sections = sectionsFromNames(config.defaultSections, logger);
  }

  if (sections.length == 0) {
    throw new ReadmeError("No sections selected for generation");
  }

  spinner.start(`Writing ${sections.map((s) => s.name).join(", ")}`);
  const result = await generator.generate(repo, sections, existingReadme).catch((err: unknown) => {
    spinner.stop("Generation failed", 1);
    throw err;
  });
  spinner.stop(result.optimization ? "README improved" : "README generated");

  await fs.writeFile(outputPath, result.content, "utf-8");

  clack.note(
    [
      `Sections: ${result.sectionsGenerated.join(", ")}`,
      `Length: ${result.content.length} characters`,
    ].join("\n"),
    outputPath,
  );
  clack.outro(chalk.green.bold("Done!"));
}
