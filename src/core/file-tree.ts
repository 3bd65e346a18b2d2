import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { IGNORE_DIRS, VISIBLE_DOTFILES } from "../constants.js";

export const EMPTY_TREE = "No files found";

function isListed(entry: Dirent): boolean {
  if (IGNORE_DIRS.includes(entry.name)) return false;
  if (entry.name.startsWith(".")) return VISIBLE_DOTFILES.includes(entry.name);
  return true;
}

// directories first, then case-insensitive by name
function compareEntries(a: Dirent, b: Dirent): number {
  const dirOrder = Number(b.isDirectory()) - Number(a.isDirectory());
  if (dirOrder != 0) return dirOrder;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter(isListed).sort(compareEntries);
  } catch {
    // unreadable directories are left out of the tree
    return [];
  }
}

/**
 * `tree`-style listing of the repository, `maxDepth` levels deep.
 *
 * ```
 * ├── src/
 * │   └── index.ts
 * └── package.json
 * ```
 */
export async function renderFileTree(root: string, maxDepth: number): Promise<string> {
  const lines: string[] = [];

  const walk = async (dir: string, prefix: string, depth: number): Promise<void> => {
    const entries = await listDir(dir);
    for (const [i, entry] of entries.entries()) {
      const isLast = i == entries.length - 1;
      const connector = isLast ? "└── " : "├── ";

      if (entry.isDirectory()) {
        lines.push(`${prefix}${connector}${entry.name}/`);
        if (depth + 1 < maxDepth) {
          await walk(path.join(dir, entry.name), prefix + (isLast ? "    " : "│   "), depth + 1);
        }
      } else {
        lines.push(`${prefix}${connector}${entry.name}`);
      }
    }
  };

  await walk(root, "", 0);
  return lines.length > 0 ? lines.join("\n") : EMPTY_TREE;
}
