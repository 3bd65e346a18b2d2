import path from "node:path";
import fs from "node:fs/promises";
import * as clack from "@clack/prompts";
import chalk from "chalk";
import { ReadmeError } from "../errors.js";
import { readTextFile } from "../utils.js";
import { createCommandContext } from "./context.js";
import { askForFeedback } from "./helpers.js";

export interface RefineFlags {
  file: string;
  output?: string;
  feedback?: string;
  verbose: boolean;
}

export async function refineCommand(flags: RefineFlags): Promise<void> {
  clack.intro(chalk.green.bold("readmesmith refine"));

  const readmePath = path.resolve(flags.file);
  const content = await readTextFile(readmePath);
  if (content === null) {
    throw new ReadmeError("README file not found", `Path: ${readmePath}`);
  }

  const { logger, refiner } = await createCommandContext({ verbose: flags.verbose });

  const feedback = flags.feedback?.trim() || (await askForFeedback());
  if (!feedback) {
    clack.outro(chalk.yellow("No feedback provided."));
    return;
  }

  const spinner = clack.spinner();
  spinner.start("Refining README");
  const result = await refiner.refine(content, feedback);
  spinner.stop(
    result.tier == "minimal"
      ? "Refinement failed, feedback attached as a note"
      : `README refined (${result.tier})`,
    result.tier == "minimal" ? 1 : 0,
  );
  logger.debug(`Attempts: ${result.attempts.map((a) => `${a.tier}:${a.ok ? "ok" : "failed"}`).join(", ")}`);

  const outputPath = flags.output ? path.resolve(flags.output) : readmePath;
  await fs.writeFile(outputPath, result.content, "utf-8");
  clack.outro(chalk.green(`Refined README saved to ${outputPath}`));
}
