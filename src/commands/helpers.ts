import * as clack from "@clack/prompts";
import chalk from "chalk";
import { SECTION_CATALOG } from "../constants.js";
import type { ConfigData, SectionDescriptor } from "../core/types.js";
import { ReadmeError, errorMessage } from "../errors.js";
import { DEFAULT_MODELS } from "../providers/index.js";
import { Provider } from "../providers/types.js";

const PROVIDER_LABELS: Record<Provider, string> = {
  [Provider.GOOGLE]: "Google Gemini",
  [Provider.OPENAI]: "OpenAI",
  [Provider.CLAUDE]: "Anthropic Claude",
};

function exitIfCancelled<T>(value: T | symbol): T {
  if (clack.isCancel(value)) {
    clack.cancel("Operation cancelled.");
    process.exit(0);
  }
  return value;
}

function notEmpty(label: string) {
  return (value: string | undefined): string | undefined =>
    !value || !value.trim() ? `${label} cannot be empty` : undefined;
}

export async function makeModelSelection(
  current?: Partial<ConfigData>,
): Promise<Pick<ConfigData, "provider" | "model" | "apiKey">> {
  clack.note(
    "You need to select your LLM provider and enter your api key",
    "Let's set you up!",
  );

  const provider = exitIfCancelled(
    await clack.select<Provider>({
      message: "Choose LLM provider",
      initialValue: current?.provider ?? Provider.GOOGLE,
      options: Object.values(Provider).map((value) => ({
        value,
        label: PROVIDER_LABELS[value],
      })),
    }),
  );

  const model = exitIfCancelled(
    await clack.text({
      message: "Enter model name",
      initialValue:
        current?.provider == provider && current.model
          ? current.model
          : DEFAULT_MODELS[provider],
      validate: notEmpty("Model name"),
    }),
  );

  const apiKey = exitIfCancelled(
    await clack.password({
      message: "Enter API key",
      validate: notEmpty("API key"),
    }),
  );

  return { provider, model: model.trim(), apiKey: apiKey.trim() };
}

export async function makeSectionSelection(
  initialIds: readonly string[],
): Promise<SectionDescriptor[]> {
  const ids = exitIfCancelled(
    await clack.multiselect<string>({
      message: "Select sections to include",
      initialValues: [...initialIds],
      required: true,
      options: SECTION_CATALOG.map((section) => ({
        value: section.id,
        label: section.name,
        hint: section.description,
      })),
    }),
  );

  return SECTION_CATALOG.filter((section) => ids.includes(section.id));
}

export async function confirmOverwrite(fileName: string): Promise<boolean> {
  return exitIfCancelled(
    await clack.confirm({
      message: `${fileName} already exists. Overwrite?`,
      initialValue: false,
    }),
  );
}

export async function askForFeedback(): Promise<string> {
  const feedback = exitIfCancelled(
    await clack.text({
      message: "What would you like to improve in the README?",
      placeholder: "e.g. add a troubleshooting section",
    }),
  );
  return feedback.trim();
}

export function printError(err: unknown): void {
  console.error(`${chalk.red.bold("Error:")} ${errorMessage(err)}`);
  if (err instanceof ReadmeError && err.internalDetails) {
    console.error(chalk.dim(`Details: ${err.internalDetails}`));
  }
}

/** Runs a command body, turning any failure into a message and exit code 1. */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    printError(err);
    process.exitCode = 1;
  }
}
