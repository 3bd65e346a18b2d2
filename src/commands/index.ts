import { Cli } from "clerc";
import { DEFAULT_OUTPUT_FILE } from "../constants.js";
import { ReadmeError } from "../errors.js";
import { analyzeCommand, type AnalyzeFlags } from "./analyze.js";
import { configCommand, type ConfigFlags } from "./config.js";
import { generateCommand, type GenerateFlags } from "./generate.js";
import { printError, runAction } from "./helpers.js";
import { refineCommand, type RefineFlags } from "./refine.js";
import { sectionsCommand } from "./sections.js";

export interface CommandActions {
  generate(flags: GenerateFlags): Promise<void>;
  config(flags: ConfigFlags): Promise<void>;
  sections(): Promise<void>;
  refine(flags: RefineFlags): Promise<void>;
  analyze(flags: AnalyzeFlags): Promise<void>;
}

export const defaultActions: CommandActions = {
  generate: generateCommand,
  config: configCommand,
  sections: async () => sectionsCommand(),
  refine: refineCommand,
  analyze: analyzeCommand,
};

function parseConcurrency(value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 1) {
    throw new ReadmeError("--concurrency must be a positive integer");
  }
  return value;
}

const verbose = {
  type: Boolean,
  short: "v",
  description: "Show debug output",
} as const;

export function createCli(actions: CommandActions = defaultActions) {
  return Cli()
    .name("readmesmith")
    .scriptName("readmesmith")
    .description("Generate and refine README files with an LLM")
    .version("0.1.0")
    .command("generate", "Generate a README for a project", {
      flags: {
        path: {
          type: String,
          short: "p",
          default: ".",
          description: "Project path",
        },
        output: {
          type: String,
          short: "o",
          description: `Output file name (defaults to ${DEFAULT_OUTPUT_FILE} or the configured name)`,
        },
        sections: {
          type: [String],
          short: "s",
          description: "Section ids or names to include (repeatable)",
        },
        noInteractive: {
          type: Boolean,
          description: "Skip interactive prompts",
        },
        overwrite: {
          type: Boolean,
          description: "Overwrite an existing README without asking",
        },
        improve: {
          type: Boolean,
          description: "Improve the existing README instead of writing a new one",
        },
        concurrency: {
          type: Number,
          short: "c",
          description: "Sections generated in parallel",
        },
        verbose,
      },
    })
    .on("generate", (ctx) =>
      runAction(() =>
        actions.generate({
          path: ctx.flags.path,
          output: ctx.flags.output,
          sections: ctx.flags.sections,
          noInteractive: ctx.flags.noInteractive === true,
          overwrite: ctx.flags.overwrite === true,
          improve: ctx.flags.improve === true,
          concurrency: parseConcurrency(ctx.flags.concurrency),
          verbose: ctx.flags.verbose === true,
        }),
      ),
    )
    .command("config", "Configure provider, API key and default sections", {
      flags: {
        setApiKey: {
          type: String,
          description: "Store the API key for the configured provider",
        },
        getApiKey: {
          type: Boolean,
          description: "Show the current API key (masked)",
        },
        setSections: {
          type: [String],
          description: "Set the default sections (repeatable)",
        },
        getSections: {
          type: Boolean,
          description: "Show the default sections",
        },
      },
    })
    .on("config", (ctx) =>
      runAction(() =>
        actions.config({
          setApiKey: ctx.flags.setApiKey,
          getApiKey: ctx.flags.getApiKey === true,
          setSections: ctx.flags.setSections,
          getSections: ctx.flags.getSections === true,
        }),
      ),
    )
    .command("sections", "List available README sections")
    .on("sections", () => runAction(() => actions.sections()))
    .command("refine", "Refine an existing README with feedback", {
      flags: {
        file: {
          type: String,
          short: "f",
          default: DEFAULT_OUTPUT_FILE,
          description: "README file to refine",
        },
        output: {
          type: String,
          short: "o",
          description: "Write the result here instead of overwriting --file",
        },
        feedback: {
          type: String,
          description: "Feedback to apply (prompted for when omitted)",
        },
        verbose,
      },
    })
    .on("refine", (ctx) =>
      runAction(() =>
        actions.refine({
          file: ctx.flags.file,
          output: ctx.flags.output,
          feedback: ctx.flags.feedback,
          verbose: ctx.flags.verbose === true,
        }),
      ),
    )
    .command("analyze", "Print what the analyzer finds in a project", {
      flags: {
        path: {
          type: String,
          short: "p",
          default: ".",
          description: "Project path",
        },
        verbose,
      },
    })
    .on("analyze", (ctx) =>
      runAction(() =>
        actions.analyze({
          path: ctx.flags.path,
          verbose: ctx.flags.verbose === true,
        }),
      ),
    )
    .errorHandler((error: unknown) => {
      printError(error);
      process.exitCode = 1;
    });
}
