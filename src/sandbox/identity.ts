import { basename, dirname, join } from "node:path";

/**
 * Derived names of one sandbox. Nothing here is stored; every command
 * recomputes it from the repository root and the user-given name.
 */
export interface SandboxIdentity {
  /** Name as typed by the user; also the branch looked up by `start`. */
  name: string;
  safeName: string;
  repoName: string;
  containerName: string;
  worktreePath: string;
}

/**
 * Make a name usable in container names and paths. `a/b` and `a-b` collide.
 */
export function safeName(name: string): string {
  return name.replace(/\//g, "-");
}

export function containerName(repoName: string, sandboxName: string): string {
  return `sandbox-${repoName}-${sandboxName}`;
}

export function worktreePath(repoRoot: string, sandboxName: string): string {
  return join(dirname(repoRoot), `${basename(repoRoot)}__${sandboxName}`);
}

export function sandboxIdentity(repoRoot: string, name: string): SandboxIdentity {
  const safe = safeName(name);
  const repoName = basename(repoRoot);
  return {
    name,
    safeName: safe,
    repoName,
    containerName: containerName(repoName, safe),
    worktreePath: worktreePath(repoRoot, safe),
  };
}

const ADJECTIVES = [
  "amber", "brisk", "calm", "dusty", "eager", "fuzzy", "gentle", "hollow",
  "icy", "jolly", "keen", "lucky", "mellow", "nimble", "quiet", "rusty",
];

const NOUNS = [
  "otter", "falcon", "maple", "comet", "badger", "harbor", "pebble", "lantern",
  "willow", "canyon", "sparrow", "meadow", "ember", "glacier", "orchid", "tundra",
];

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

function pick<T>(items: readonly T[], random: RandomSource): T {
  const i = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[i];
}

/**
 * `adjective-noun`. Not unique: a repeat reuses that sandbox.
 */
export function generateName(random: RandomSource = Math.random): string {
  return `${pick(ADJECTIVES, random)}-${pick(NOUNS, random)}`;
}
