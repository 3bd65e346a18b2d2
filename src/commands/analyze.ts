import chalk from "chalk";
import { analyzeRepository } from "../core/analyzer.js";
import { createCliLogger } from "../logger.js";

export interface AnalyzeFlags {
  path: string;
  verbose: boolean;
}

export async function analyzeCommand(flags: AnalyzeFlags): Promise<void> {
  const logger = createCliLogger({ verbose: flags.verbose });
  const repo = await analyzeRepository(flags.path, { logger });

  const languages = Object.entries(repo.languages)
    .sort(([, a], [, b]) => b - a)
    .map(([name, bytes]) => `${name} (${bytes} bytes)`);

  const rows: Array<[string, string]> = [
    ["Name", repo.name],
    ["Description", repo.description ?? "-"],
    ["Language", repo.language ?? "-"],
    ["Languages", languages.join(", ") || "-"],
    ["Topics", repo.topics.join(", ") || "-"],
    ["License", repo.license ?? "-"],
    ["License file", repo.licenseFile ?? "-"],
    ["Clone URL", repo.cloneUrl ?? "-"],
    ["Code samples", Object.keys(repo.codeSamples ?? {}).join(", ") || "-"],
  ];

  const width = Math.max(...rows.map(([label]) => label.length));
  for (const [label, value] of rows) {
    console.log(`${chalk.bold(label.padEnd(width))}  ${value}`);
  }
  if (repo.fileStructure) {
    console.log(`\n${chalk.bold("Structure")}\n${chalk.dim(repo.fileStructure)}`);
  }
}
