import { execFileSync } from "node:child_process";

export interface GitRemoteInfo {
  repo?: string;
  cloneUrl?: string;
}

const GITHUB_SSH = /^git@github\.com:([^/]+)\/(.+?)(?:\.git)?$/;
const GITHUB_HTTPS = /github\.com\/([^/]+)\/(.+?)(?:\.git)?\/?$/;

/**
 * Repo name and https clone URL from a remote URL. GitHub SSH and HTTPS
 * remotes are normalised; any other remote is kept as the clone URL.
 */
export function parseGitUrl(url: string): GitRemoteInfo {
  const trimmed = url.trim();
  if (!trimmed) return {};

  const match = GITHUB_SSH.exec(trimmed) ?? GITHUB_HTTPS.exec(trimmed);
  if (match) {
    const [, owner, repo] = match;
    return { repo, cloneUrl: `https://github.com/${owner}/${repo}.git` };
  }

  return { cloneUrl: trimmed };
}

export class GitClient {
  constructor(public readonly cwd: string) {}

  private run(args: string[]): string | null {
    try {
      const out = execFileSync("git", args, {
        cwd: this.cwd,
        encoding: "utf-8",
        // stdio takes [subprocess.stdin, subprocess.stdout, subprocess.stderr]
        // we only need stdout
        stdio: ["ignore", "pipe", "ignore"],
      });
      return out.trim() || null;
    } catch {
      // not a repository, no such remote, or git missing
      return null;
    }
  }

  public originUrl(): string | null {
    return this.run(["config", "--get", "remote.origin.url"]);
  }

  public remoteInfo(): GitRemoteInfo {
    const url = this.originUrl();
    return url ? parseGitUrl(url) : {};
  }
}
