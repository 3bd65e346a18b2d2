import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** Creates a temp directory holding `files` (relative path → content). */
export function makeTempDir(files: Record<string, string> = {}): string {
  const root = mkdtempSync(join(tmpdir(), "readmesmith-"));
  for (const [relative, content] of Object.entries(files)) {
    const target = join(root, relative);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return root;
}

export function removeTempDir(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
