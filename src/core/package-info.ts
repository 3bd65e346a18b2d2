import path from "node:path";
import { readTextFile } from "../utils.js";

export interface PackageInfo {
  name?: string;
  description?: string;
  keywords: string[];
  homepage?: string;
  license?: string;
}

type ManifestParser = (content: string) => PackageInfo | null;

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value == "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function asString(value: unknown): string | undefined {
  return typeof value == "string" && value.trim() ? value.trim() : undefined;
}

function asStringArray(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((v): v is string => typeof v == "string")
    : [];
}

function parsePackageJson(content: string): PackageInfo | null {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }
  const pkg = asRecord(data);
  if (!pkg) return null;

  // "license" may still be the legacy { type, url } object
  const license = asString(pkg.license) ?? asString(asRecord(pkg.license)?.type);
  return {
    name: asString(pkg.name),
    description: asString(pkg.description),
    keywords: asStringArray(pkg.keywords),
    homepage: asString(pkg.homepage),
    license,
  };
}

function tomlString(content: string, key: string): string | undefined {
  const match = new RegExp(`^${key}\\s*=\\s*"([^"]*)"`, "m").exec(content);
  return match ? asString(match[1]) : undefined;
}

function tomlStringArray(content: string, key: string): string[] {
  const match = new RegExp(`^${key}\\s*=\\s*\\[([^\\]]*)\\]`, "m").exec(content);
  if (!match) return [];
  return [...match[1].matchAll(/"([^"]+)"/g)].map((m) => m[1]);
}

// pyproject.toml ([project] or [tool.poetry]) and Cargo.toml ([package])
// keep these keys at the start of a line, which is all we need.
function parseToml(content: string): PackageInfo | null {
  const name = tomlString(content, "name");
  const description = tomlString(content, "description");
  if (!name && !description) return null;
  return {
    name,
    description,
    keywords: tomlStringArray(content, "keywords"),
    homepage: tomlString(content, "homepage"),
    license: tomlString(content, "license"),
  };
}

function parseSetupPy(content: string): PackageInfo | null {
  const name = /name\s*=\s*["']([^"']+)["']/.exec(content)?.[1];
  const description = /description\s*=\s*["']([^"']+)["']/.exec(content)?.[1];
  if (!name && !description) return null;
  return { name, description, keywords: [] };
}

function parseGoMod(content: string): PackageInfo | null {
  const module = /^module\s+(\S+)/m.exec(content)?.[1];
  if (!module) return null;
  return { name: path.posix.basename(module), keywords: [] };
}

const MANIFESTS: ReadonlyArray<[string, ManifestParser]> = [
  ["package.json", parsePackageJson],
  ["pyproject.toml", parseToml],
  ["setup.py", parseSetupPy],
  ["Cargo.toml", parseToml],
  ["go.mod", parseGoMod],
];

/** Metadata from the first manifest in the repository root that yields any. */
export async function readPackageInfo(root: string): Promise<PackageInfo> {
  for (const [file, parse] of MANIFESTS) {
    const content = await readTextFile(path.join(root, file));
    if (content === null) continue;
    const info = parse(content);
    if (info) return info;
  }
  return { keywords: [] };
}
