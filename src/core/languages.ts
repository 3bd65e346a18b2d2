import fg from "fast-glob";
import path from "node:path";
import { IGNORE_DIRS, LANGUAGE_BY_EXTENSION } from "../constants.js";

export const UNKNOWN_LANGUAGE = "Unknown";

export function languageForFile(fileName: string): string | undefined {
  const ext = path.extname(fileName).toLowerCase();
  return Object.hasOwn(LANGUAGE_BY_EXTENSION, ext) ? LANGUAGE_BY_EXTENSION[ext] : undefined;
}

/** Total bytes per language, by file extension, skipping vendored and build output. */
export async function detectLanguages(root: string): Promise<Record<string, number>> {
  const entries = await fg("**/*", {
    cwd: root,
    ignore: IGNORE_DIRS.map((dir) => `**/${dir}/**`),
    onlyFiles: true,
    dot: true,
    stats: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  const totals: Record<string, number> = {};
  for (const entry of entries) {
    const language = languageForFile(entry.name);
    if (!language) continue;
    totals[language] = (totals[language] ?? 0) + (entry.stats?.size ?? 0);
  }
  return totals;
}

export function primaryLanguage(languages: Record<string, number>): string {
  let best = UNKNOWN_LANGUAGE;
  let bestSize = -1;
  for (const [language, size] of Object.entries(languages)) {
    if (size > bestSize) {
      best = language;
      bestSize = size;
    }
  }
  return best;
}
