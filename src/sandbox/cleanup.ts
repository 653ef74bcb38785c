import { resolve } from "node:path";
import type { ContainerSummary } from "../docker/parser.js";
import { shortBranchName, type Worktree } from "../git/parser.js";
import { error, log } from "../utils/logger.js";
import type { SandboxIdentity } from "./identity.js";

export interface CleanupOps {
  listWorktrees(): Worktree[];
  listContainers(): ContainerSummary[];
  containerExists(name: string): boolean;
  removeContainer(name: string): boolean;
  /** Honors the caller's --force choice. */
  removeWorktree(path: string): boolean;
  worktreeExists(path: string): boolean;
  pruneWorktrees(): boolean;
  deleteBranch(repoDir: string, branch: string): boolean;
  confirm(question: string): Promise<boolean>;
}

export interface RemoveResult {
  removedContainer: boolean;
  removedWorktree: boolean;
  /** Branch the worktree had checked out, looked up before removal. */
  branch: string;
}

function branchOf(worktrees: Worktree[], path: string): string {
  const target = resolve(path);
  const wt = worktrees.find((w) => resolve(w.path) === target);
  return shortBranchName(wt?.branch);
}

/**
 * Remove container and worktree independently. Fails only if neither existed.
 */
export function removeSandbox(identity: SandboxIdentity, ops: CleanupOps): RemoveResult {
  const branch = branchOf(ops.listWorktrees(), identity.worktreePath);
  const removedContainer = ops.removeContainer(identity.containerName);
  const removedWorktree = ops.removeWorktree(identity.worktreePath);

  if (removedContainer) log(`removed container: ${identity.containerName}`);
  if (removedWorktree) log(`removed worktree: ${identity.worktreePath}`);
  else if (ops.worktreeExists(identity.worktreePath)) {
    error(`worktree has local changes, kept: ${identity.worktreePath} (use rm --force)`);
  }

  return { removedContainer, removedWorktree, branch };
}

/**
 * Offer to delete the sandbox's branch. Runs in the main repository, since the
 * worktree directory is gone (or going).
 */
export async function offerBranchDeletion(
  branch: string,
  mainRepoDir: string,
  ops: CleanupOps,
): Promise<boolean> {
  if (!branch) return false;
  if (!(await ops.confirm(`Delete branch '${branch}'?`))) return false;
  if (!ops.deleteBranch(mainRepoDir, branch)) {
    error(`failed to delete branch: ${branch}`);
    return false;
  }
  log(`deleted branch: ${branch}`);
  return true;
}

/**
 * `rm`: exit code 1 only when neither container nor worktree was found.
 */
export async function resolveRemove(
  identity: SandboxIdentity,
  mainRepoDir: string,
  ops: CleanupOps,
): Promise<number> {
  const result = removeSandbox(identity, ops);
  if (!result.removedContainer && !result.removedWorktree) {
    error(`nothing found to remove for: ${identity.safeName}`);
    return 1;
  }
  if (result.removedWorktree) await offerBranchDeletion(result.branch, mainRepoDir, ops);
  return 0;
}

export interface PurgeResult {
  containers: string[];
  worktrees: string[];
}

/**
 * Remove every container and worktree of a repository. Best-effort, no rollback.
 * Container matching is by substring, so a repository named `app` also
 * matches `sandbox-myapp-*`.
 */
export function resolvePurge(repoName: string, ops: CleanupOps): PurgeResult {
  const containers: string[] = [];
  const worktrees: string[] = [];

  log(`removing all containers for ${repoName}...`);
  for (const c of ops.listContainers()) {
    if (!c.name.includes(repoName)) continue;
    if (ops.removeContainer(c.name)) {
      log(`  removed container: ${c.name}`);
      containers.push(c.name);
    }
  }

  log("removing worktrees...");
  for (const wt of ops.listWorktrees()) {
    if (!wt.path.includes(`${repoName}__`)) continue;
    if (ops.removeWorktree(wt.path)) {
      log(`  removed worktree: ${wt.path}`);
      worktrees.push(wt.path);
    } else {
      error(`  kept worktree with local changes: ${wt.path} (use rm --force)`);
    }
  }

  ops.pruneWorktrees();
  log("done");
  return { containers, worktrees };
}

/**
 * Called by the shell function after the session exits. Returns whether the
 * worktree was removed (the shell must then leave it).
 */
export async function resolvePostExit(
  identity: SandboxIdentity,
  mainRepoDir: string,
  ops: CleanupOps,
): Promise<boolean> {
  if (!ops.containerExists(identity.containerName)) return false;

  const question = `Remove sandbox '${identity.safeName}' (container and worktree, uncommitted changes included)?`;
  if (!(await ops.confirm(question))) {
    log(`kept sandbox; resume with: treebox start ${identity.name}`);
    return false;
  }

  const result = removeSandbox(identity, ops);
  if (result.removedWorktree) await offerBranchDeletion(result.branch, mainRepoDir, ops);
  return result.removedWorktree;
}
