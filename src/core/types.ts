import type { Provider } from "../providers/types.js";

export interface ConfigData {
  provider: Provider;
  model: string;
  apiKey: string;
  defaultSections?: string[];
  outputFileName?: string;
  maxOutputTokens?: number;
  fallbackMaxOutputTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

export interface SectionDescriptor {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  readonly order: number;
}

export interface RepositoryInfo {
  name: string;
  description?: string;
  language?: string;
  /** Bytes of source per language. */
  languages: Record<string, number>;
  topics: string[];
  homepage?: string;
  cloneUrl?: string;
  license?: string;
  licenseFile?: string;
  fileStructure?: string;
  codeSamples?: Record<string, string>;
}

export interface GenerationResult {
  content: string;
  sectionsGenerated: string[];
  /** True when an existing README was refined instead of written from scratch. */
  optimization: boolean;
}

export type SectionOutcome =
  | { status: "ok"; section: SectionDescriptor; body: string }
  | { status: "failed"; section: SectionDescriptor; error: Error };

export type MarkdownSectionMap = Map<string, string>;

export type RefinementTier = "standard" | "high-budget" | "targeted";

export type RefinementAttempt =
  | { tier: RefinementTier; ok: true; content: string }
  | { tier: RefinementTier; ok: false; error: Error };

export interface RefinementResult {
  content: string;
  tier: RefinementTier | "minimal";
  attempts: RefinementAttempt[];
}

export interface ExistingReadme {
  path: string;
  content: string;
}
