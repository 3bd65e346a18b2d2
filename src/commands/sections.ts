import chalk from "chalk";
import { SECTION_CATALOG } from "../constants.js";

export function sectionsCommand(): void {
  const width = Math.max(...SECTION_CATALOG.map((s) => s.id.length));

  console.log(chalk.bold("Available README sections\n"));
  for (const section of SECTION_CATALOG) {
    const marker = section.required ? chalk.yellow("*") : " ";
    console.log(
      `${marker} ${chalk.green(section.id.padEnd(width))}  ${chalk.blue(section.name)}  ${chalk.dim(section.description)}`,
    );
  }
  console.log(chalk.dim(`\n${chalk.yellow("*")} core section`));
}
