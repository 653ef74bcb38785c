import { generateName, sandboxIdentity, type RandomSource, type SandboxIdentity } from "./identity.js";
import type { LaunchPlan } from "./launch.js";
import { log } from "../utils/logger.js";

export type StartAction =
  | "recreate"
  | "start-fresh"
  | "create-from-local-branch"
  | "create-from-remote-branch"
  | "create-new-branch";

export interface StartFacts {
  worktreeExists: boolean;
  containerExists: boolean;
  localBranchExists: boolean;
  remoteBranchExists: boolean;
}

/**
 * First match wins; the order matters.
 */
export function decideStartAction(facts: StartFacts): StartAction {
  if (facts.worktreeExists && facts.containerExists) return "recreate";
  if (facts.worktreeExists) return "start-fresh";
  if (facts.localBranchExists) return "create-from-local-branch";
  if (facts.remoteBranchExists) return "create-from-remote-branch";
  return "create-new-branch";
}

export interface StartProbes {
  worktreeExists(): boolean;
  containerExists(): boolean;
  localBranchExists(): boolean;
  /** May fetch from the remote. */
  remoteBranchExists(): boolean;
}

/**
 * Run the probes in decision order. Branch probes are skipped once the
 * worktree is known to exist, and the remote probe once a local branch is
 * found; skipped facts are reported as false, which cannot change the action.
 */
export function gatherStartFacts(probes: StartProbes): StartFacts {
  const worktreeExists = probes.worktreeExists();
  const containerExists = probes.containerExists();
  const localBranchExists = !worktreeExists && probes.localBranchExists();
  const remoteBranchExists = !worktreeExists && !localBranchExists && probes.remoteBranchExists();
  return { worktreeExists, containerExists, localBranchExists, remoteBranchExists };
}

export type StartEffect =
  | { kind: "remove-container"; containerName: string }
  | { kind: "add-worktree"; path: string; branch: string; newBranch: boolean }
  | { kind: "copy-env-files"; worktreePath: string }
  | { kind: "install-settings"; worktreePath: string }
  | { kind: "launch"; resume: boolean };

export interface StartPlan {
  action: StartAction;
  identity: SandboxIdentity;
  effects: StartEffect[];
}

function addWorktreeEffect(action: StartAction, identity: SandboxIdentity, branchPrefix: string): StartEffect {
  const { name, worktreePath: path } = identity;
  if (action === "create-new-branch") {
    return { kind: "add-worktree", path, branch: `${branchPrefix}${name}`, newBranch: true };
  }
  // Local or remote: git resolves `name` to origin/<name> when no local branch exists.
  return { kind: "add-worktree", path, branch: name, newBranch: false };
}

/**
 * The ordered side effects for an action. Pure.
 */
export function planStart(
  identity: SandboxIdentity,
  facts: StartFacts,
  options: { branchPrefix: string },
): StartPlan {
  const action = decideStartAction(facts);
  const effects: StartEffect[] = [];

  switch (action) {
    case "recreate":
      // The container may be stale against the image or code; the worktree is kept.
      effects.push({ kind: "remove-container", containerName: identity.containerName });
      effects.push({ kind: "launch", resume: true });
      break;
    case "start-fresh":
      effects.push({ kind: "launch", resume: false });
      break;
    case "create-from-local-branch":
    case "create-from-remote-branch":
    case "create-new-branch":
      // A container left behind without its worktree would block `docker run --name`.
      if (facts.containerExists) {
        effects.push({ kind: "remove-container", containerName: identity.containerName });
      }
      effects.push(addWorktreeEffect(action, identity, options.branchPrefix));
      effects.push({ kind: "copy-env-files", worktreePath: identity.worktreePath });
      effects.push({ kind: "install-settings", worktreePath: identity.worktreePath });
      effects.push({ kind: "launch", resume: false });
      break;
  }

  return { action, identity, effects };
}

/**
 * Everything `applyStartPlan` needs from git, Docker and the file system.
 */
export interface StartHost {
  removeContainer(name: string): boolean;
  addWorktree(path: string, branch: string, options: { newBranch: boolean }): boolean;
  copyEnvFiles(worktreePath: string): void;
  installSettings(worktreePath: string): void;
  launch(resume: boolean): Promise<LaunchPlan>;
}

const ACTION_MESSAGES: Record<StartAction, (id: SandboxIdentity) => string> = {
  "recreate": (id) => `recreating container for sandbox: ${id.safeName}`,
  "start-fresh": (id) => `starting sandbox: ${id.safeName}`,
  "create-from-local-branch": (id) => `creating sandbox from local branch: ${id.name}`,
  "create-from-remote-branch": (id) => `creating sandbox from remote branch: origin/${id.name}`,
  "create-new-branch": (id) => `creating sandbox: ${id.safeName}`,
};

/**
 * Apply effects in order. A failed container removal or worktree add aborts
 * before launch; nothing already done is rolled back.
 */
export async function applyStartPlan(plan: StartPlan, host: StartHost): Promise<LaunchPlan> {
  log(ACTION_MESSAGES[plan.action](plan.identity));

  for (const effect of plan.effects) {
    switch (effect.kind) {
      case "remove-container":
        // Otherwise the launch would find the old container and exec into it.
        if (!host.removeContainer(effect.containerName)) {
          throw new Error(`failed to remove container: ${effect.containerName}`);
        }
        break;
      case "add-worktree":
        if (!host.addWorktree(effect.path, effect.branch, { newBranch: effect.newBranch })) {
          throw new Error(`failed to create worktree for branch: ${effect.branch}`);
        }
        break;
      case "copy-env-files":
        host.copyEnvFiles(effect.worktreePath);
        break;
      case "install-settings":
        host.installSettings(effect.worktreePath);
        break;
      case "launch":
        return host.launch(effect.resume);
    }
  }
  throw new Error(`start plan for ${plan.identity.safeName} has no launch step`);
}

export interface StartContext {
  repoRoot: string;
  branchPrefix: string;
  random?: RandomSource;
}

export interface StartResult {
  plan: StartPlan;
  launch: LaunchPlan;
}

/**
 * Resolve and launch a sandbox. `makeProbes`/`makeHost` receive the derived
 * identity so callers can bind real or fake collaborators to it.
 */
export async function resolveStart(
  name: string | undefined,
  context: StartContext,
  makeProbes: (identity: SandboxIdentity) => StartProbes,
  makeHost: (identity: SandboxIdentity) => StartHost,
): Promise<StartResult> {
  const identity = sandboxIdentity(context.repoRoot, name || generateName(context.random));
  const facts = gatherStartFacts(makeProbes(identity));
  const plan = planStart(identity, facts, { branchPrefix: context.branchPrefix });
  const launch = await applyStartPlan(plan, makeHost(identity));
  return { plan, launch };
}
