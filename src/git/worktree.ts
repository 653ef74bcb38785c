import { appendFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { execCapture, execInherit } from "../utils/process.js";
import { parseWorktreeList, type Worktree } from "./parser.js";

// Probes never throw: a failing git command is a negative answer.

export function getRepoRoot(cwd: string): string | null {
  const result = execCapture("git", ["-C", cwd, "rev-parse", "--show-toplevel"]);
  if (result.status !== 0) return null;
  const root = result.stdout.trim();
  return root || null;
}

/**
 * The shared git directory (the main repository's `.git`, also when called
 * from inside a linked worktree). `null` if git fails.
 */
export function getMainGitDir(repoRoot: string): string | null {
  const result = execCapture("git", ["-C", repoRoot, "rev-parse", "--git-common-dir"]);
  if (result.status !== 0) return null;
  const gitDir = result.stdout.trim();
  if (gitDir === ".git") return join(repoRoot, ".git");
  return gitDir || null;
}

export function listWorktrees(repoRoot: string): Worktree[] {
  const result = execCapture("git", ["-C", repoRoot, "worktree", "list", "--porcelain"]);
  if (result.status !== 0) return [];
  return parseWorktreeList(result.stdout);
}

/**
 * `newBranch: false` checks out an existing branch (git creates the local
 * tracking branch when only `origin/<branch>` exists).
 */
export function addWorktree(
  repoRoot: string,
  path: string,
  branch: string,
  options: { newBranch: boolean },
): boolean {
  const args = options.newBranch
    ? ["-C", repoRoot, "worktree", "add", "-b", branch, path]
    : ["-C", repoRoot, "worktree", "add", path, branch];
  return execInherit("git", args) === 0;
}

/**
 * Without `force`, git refuses worktrees with modified or untracked files.
 */
export function removeWorktree(
  repoRoot: string,
  path: string,
  options: { force: boolean } = { force: false },
): boolean {
  const args = ["-C", repoRoot, "worktree", "remove", ...(options.force ? ["--force"] : []), path];
  return execCapture("git", args).status === 0;
}

/**
 * `/src/repo/.git` -> `/src/repo`. Other layouts (bare repositories) yield null.
 */
export function repoDirFromGitDir(gitDir: string): string | null {
  return basename(gitDir) === ".git" ? dirname(gitDir) : null;
}

export function pruneWorktrees(repoRoot: string): boolean {
  return execCapture("git", ["-C", repoRoot, "worktree", "prune"]).status === 0;
}

export function branchExists(repoRoot: string, branch: string): boolean {
  const result = execCapture("git", [
    "-C", repoRoot, "show-ref", "--verify", "--quiet", `refs/heads/${branch}`,
  ]);
  return result.status === 0;
}

export function remoteBranchExists(
  repoRoot: string,
  branch: string,
  options: { fetch: boolean } = { fetch: true },
): boolean {
  // A failed fetch (offline, no remote) still lets us answer from cached refs.
  if (options.fetch) execCapture("git", ["-C", repoRoot, "fetch", "--quiet"]);
  const result = execCapture("git", [
    "-C", repoRoot, "show-ref", "--verify", "--quiet", `refs/remotes/origin/${branch}`,
  ]);
  return result.status === 0;
}

/**
 * Delete a local branch. `repoDir` should be the main repository, never the
 * worktree being torn down.
 */
export function deleteBranch(repoDir: string, branch: string): boolean {
  return execCapture("git", ["-C", repoDir, "branch", "-D", branch]).status === 0;
}

/**
 * Append patterns to `{gitDir}/info/exclude`, which every linked worktree
 * shares. Ignored files do not stop `git worktree remove`. Patterns already
 * listed are not repeated.
 */
export function excludeFromWorktrees(gitDir: string, patterns: string[]): void {
  const file = join(gitDir, "info", "exclude");
  const current = existsSync(file) ? readFileSync(file, "utf-8") : "";
  const listed = new Set(current.split("\n").map((line) => line.trim()));
  const missing = patterns.filter((p) => !listed.has(p));
  if (missing.length === 0) return;

  mkdirSync(dirname(file), { recursive: true });
  const separator = current && !current.endsWith("\n") ? "\n" : "";
  appendFileSync(file, `${separator}${missing.join("\n")}\n`, "utf-8");
}
