import envPaths from "env-paths";
import path from "node:path";
import fs from "node:fs/promises";
import { DEFAULT_OUTPUT_FILE, DEFAULT_SECTION_IDS } from "../constants.js";
import { ReadmeError, errorMessage } from "../errors.js";
import { DEFAULT_MODELS } from "../providers/index.js";
import { Provider } from "../providers/types.js";
import { fileExists } from "../utils.js";
import type { ConfigData } from "./types.js";

const paths = envPaths("readmesmith", { suffix: "" });

export const API_KEY_ENV: Record<Provider, string> = {
  [Provider.GOOGLE]: "GEMINI_API_KEY",
  [Provider.OPENAI]: "OPENAI_API_KEY",
  [Provider.CLAUDE]: "ANTHROPIC_API_KEY",
};

function isProvider(value: unknown): value is Provider {
  return Object.values<unknown>(Provider).includes(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value == "number" && Number.isFinite(value) ? value : undefined;
}

function parseConfig(raw: string): Partial<ConfigData> {
  const data: unknown = JSON.parse(raw);
  if (typeof data != "object" || data === null || Array.isArray(data)) {
    throw new Error("settings must be a JSON object");
  }
  const record = Object.fromEntries(Object.entries(data));

  return {
    provider: isProvider(record.provider) ? record.provider : undefined,
    model: typeof record.model == "string" ? record.model : undefined,
    apiKey: typeof record.apiKey == "string" ? record.apiKey : undefined,
    defaultSections: Array.isArray(record.defaultSections)
      ? record.defaultSections.filter((s): s is string => typeof s == "string")
      : undefined,
    outputFileName:
      typeof record.outputFileName == "string" ? record.outputFileName : undefined,
    maxOutputTokens: optionalNumber(record.maxOutputTokens),
    fallbackMaxOutputTokens: optionalNumber(record.fallbackMaxOutputTokens),
    temperature: optionalNumber(record.temperature),
    timeoutMs: optionalNumber(record.timeoutMs),
  };
}

export class ConfigService {
  private constructor(
    private readonly configPath: string,
    private readonly configDir: string,
    private data: Partial<ConfigData>,
    private readonly env: NodeJS.ProcessEnv,
  ) {}

  public static async create(
    configDir: string = paths.config,
    env: NodeJS.ProcessEnv = process.env,
  ): Promise<ConfigService> {
    const configPath = path.join(configDir, "settings.json");
    let data: Partial<ConfigData> = {};

    if (fileExists(configPath)) {
      data = await ConfigService.load(configPath);
    }

    return new ConfigService(configPath, configDir, data, env);
  }

  private static async load(configPath: string): Promise<Partial<ConfigData>> {
    try {
      const raw = await fs.readFile(configPath, "utf-8");
      return parseConfig(raw);
    } catch (err) {
      throw new ReadmeError("Config corrupted", `${configPath}: ${errorMessage(err)}`);
    }
  }

  get path(): string {
    return this.configPath;
  }

  /** True once a provider and an API key (stored or from env) are known. */
  get isInitialized(): boolean {
    return this.apiKey !== undefined;
  }

  get provider(): Provider {
    return this.data.provider ?? Provider.GOOGLE;
  }

  get model(): string {
    return this.data.model || DEFAULT_MODELS[this.provider];
  }

  get apiKey(): string | undefined {
    return this.env[API_KEY_ENV[this.provider]] || this.data.apiKey || undefined;
  }

  get defaultSections(): string[] {
    return this.data.defaultSections ?? [...DEFAULT_SECTION_IDS];
  }

  get outputFileName(): string {
    return this.data.outputFileName || DEFAULT_OUTPUT_FILE;
  }

  /** Provider credentials; fails when no API key is available. */
  public requireCredentials(): ConfigData {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new ReadmeError(
        "No API key configured.",
        `Run "readmesmith config --set-api-key <key>" or set ${API_KEY_ENV[this.provider]}.`,
      );
    }
    return {
      ...this.data,
      provider: this.provider,
      model: this.model,
      apiKey,
    };
  }

  public async save(update: Partial<ConfigData>): Promise<void> {
    try {
      this.data = { ...this.data, ...update };
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(this.data, null, 2));
    } catch (err) {
      throw new ReadmeError(
        "Failed to save your configuration.",
        `Make sure readmesmith has write access to ${this.configDir}.\nError: ${errorMessage(err)}`,
      );
    }
  }
}

export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 8) return "*".repeat(apiKey.length);
  return apiKey.slice(0, 8) + "*".repeat(apiKey.length - 8);
}
