import { CompletionService } from "../core/completion.js";
import { ConfigService } from "../core/config-service.js";
import { ReadmeGenerator } from "../core/generator.js";
import { SYSTEM_PROMPT } from "../core/prompts.js";
import { ReadmeRefiner } from "../core/refiner.js";
import { createCliLogger, type Logger } from "../logger.js";
import { createProvider } from "../providers/index.js";
import { makeModelSelection } from "./helpers.js";

export interface CommandContext {
  config: ConfigService;
  logger: Logger;
  generator: ReadmeGenerator;
  refiner: ReadmeRefiner;
}

export interface ContextOptions {
  verbose?: boolean;
  interactive?: boolean;
  concurrency?: number;
}

/**
 * Loads the configuration (asking for provider credentials when none are
 * stored and we may prompt) and wires the orchestrators to the provider.
 */
export async function createCommandContext(
  options: ContextOptions = {},
): Promise<CommandContext> {
  const logger = createCliLogger({ verbose: options.verbose });
  const config = await ConfigService.create();

  if (!config.isInitialized && options.interactive !== false) {
    await config.save(await makeModelSelection());
  }

  const credentials = config.requireCredentials();
  logger.debug(`Using ${credentials.provider} model ${credentials.model}`);

  const client = new CompletionService(
    createProvider(credentials),
    {
      maxOutputTokens: credentials.maxOutputTokens,
      temperature: credentials.temperature,
      timeoutMs: credentials.timeoutMs,
      systemPrompt: SYSTEM_PROMPT,
    },
    logger,
  );
  const refiner = new ReadmeRefiner(client, {
    logger,
    fallbackMaxTokens: credentials.fallbackMaxOutputTokens,
  });
  const generator = new ReadmeGenerator(client, {
    logger,
    refiner,
    concurrency: options.concurrency,
  });

  return { config, logger, generator, refiner };
}
