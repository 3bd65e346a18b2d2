import path from "node:path";
import { GitClient } from "../adapters/git.js";
import {
  ENTRY_POINTS,
  FILE_TREE_DEPTH,
  LICENSE_FILES,
  MANIFEST_SAMPLE_FILES,
  README_FILES,
  SAMPLE_CHAR_LIMIT,
  SAMPLE_TOKEN_BUDGET,
} from "../constants.js";
import { ReadmeError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { dirExists, fileExists, readTextFile } from "../utils.js";
import { renderFileTree } from "./file-tree.js";
import { detectLanguages, primaryLanguage } from "./languages.js";
import { readPackageInfo } from "./package-info.js";
import { TokenBudget } from "./tokens.js";
import type { ExistingReadme, RepositoryInfo } from "./types.js";

const LICENSE_MARKERS: ReadonlyArray<[RegExp, string]> = [
  [/\bMIT\b/, "MIT"],
  [/\bAPACHE\b/, "Apache 2.0"],
  [/\bGPL\b|GENERAL PUBLIC LICENSE/, "GPL"],
  [/\bBSD\b/, "BSD"],
  [/\bISC\b/, "ISC"],
];

export interface AnalyzeOptions {
  logger?: Logger;
  /** Tokens of file content allowed into the code samples. */
  sampleTokenBudget?: number;
}

export function findLicenseFile(root: string): string | undefined {
  return LICENSE_FILES.find((name) => fileExists(path.join(root, name)));
}

export async function detectLicense(
  root: string,
  declared: string | undefined,
  licenseFile: string | undefined,
): Promise<string | undefined> {
  if (declared) return declared;
  if (!licenseFile) return undefined;

  const text = await readTextFile(path.join(root, licenseFile));
  if (text === null) return undefined;

  const upper = text.toUpperCase();
  const match = LICENSE_MARKERS.find(([pattern]) => pattern.test(upper));
  return match ? match[1] : "Custom";
}

/**
 * Manifests plus the usual entry points for the primary language, first
 * SAMPLE_CHAR_LIMIT characters each, until the token budget runs out.
 */
export async function collectCodeSamples(
  root: string,
  language: string,
  budget: TokenBudget,
): Promise<Record<string, string>> {
  const samples: Record<string, string> = {};
  const candidates = [...MANIFEST_SAMPLE_FILES, ...(ENTRY_POINTS[language] ?? [])];

  for (const file of candidates) {
    const content = await readTextFile(path.join(root, file));
    if (content === null) continue;

    const excerpt = content.slice(0, SAMPLE_CHAR_LIMIT);
    if (!budget.trySpend(excerpt)) break;
    samples[file] = excerpt;
  }

  return samples;
}

export async function findExistingReadme(root: string): Promise<ExistingReadme | null> {
  for (const name of README_FILES) {
    const filePath = path.join(root, name);
    const content = await readTextFile(filePath);
    if (content !== null) return { path: filePath, content };
  }
  return null;
}

export async function analyzeRepository(
  root: string,
  options: AnalyzeOptions = {},
): Promise<RepositoryInfo> {
  const logger = options.logger ?? silentLogger;
  const absolute = path.resolve(root);
  if (!dirExists(absolute)) {
    throw new ReadmeError("Path does not exist or is not a directory", `Path: ${absolute}`);
  }

  const pkg = await readPackageInfo(absolute);
  const languages = await detectLanguages(absolute);
  const language = primaryLanguage(languages);
  const fileStructure = await renderFileTree(absolute, FILE_TREE_DEPTH);

  const budget = TokenBudget.create(options.sampleTokenBudget ?? SAMPLE_TOKEN_BUDGET);
  const codeSamples = await collectCodeSamples(absolute, language, budget);
  logger.debug(
    `Collected ${Object.keys(codeSamples).length} code samples, ${budget.remaining} tokens left`,
  );

  const remote = new GitClient(absolute).remoteInfo();
  const licenseFile = findLicenseFile(absolute);
  const license = await detectLicense(absolute, pkg.license, licenseFile);

  return {
    name: pkg.name ?? remote.repo ?? path.basename(absolute),
    description: pkg.description,
    language,
    languages,
    topics: [...new Set(pkg.keywords)],
    homepage: pkg.homepage,
    cloneUrl: remote.cloneUrl,
    license,
    licenseFile,
    fileStructure,
    codeSamples,
  };
}
