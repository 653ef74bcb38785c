export interface Worktree {
  path: string;
  /** Full ref, e.g. `refs/heads/task/foo`. Absent for a detached HEAD. */
  branch?: string;
  head?: string;
}

/**
 * Parse `git worktree list --porcelain` output.
 * Format (one block per worktree, blocks separated by a blank line):
 *   worktree /path/to/repo
 *   HEAD 1a2b3c...
 *   branch refs/heads/main
 */
export function parseWorktreeList(output: string): Worktree[] {
  const worktrees: Worktree[] = [];
  let current: Worktree | null = null;

  for (const line of output.split("\n")) {
    if (line.startsWith("worktree ")) {
      if (current) worktrees.push(current);
      current = { path: line.slice("worktree ".length) };
    } else if (current && line.startsWith("branch ")) {
      current.branch = line.slice("branch ".length);
    } else if (current && line.startsWith("HEAD ")) {
      current.head = line.slice("HEAD ".length);
    }
  }
  if (current) worktrees.push(current);

  return worktrees;
}

/**
 * `refs/heads/feature/x` -> `feature/x`. Other refs are returned as-is.
 */
export function shortBranchName(ref: string | undefined): string {
  if (!ref) return "";
  return ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
}
