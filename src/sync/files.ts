import { copyFileSync, readdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { log } from "../utils/logger.js";

/**
 * Expand ~ to home directory.
 */
export function expandHome(filePath: string, home: string = homedir()): string {
  if (filePath === "~") return resolve(home);
  if (filePath.startsWith("~/")) {
    return resolve(home, filePath.slice(2));
  }
  return resolve(filePath);
}

export function isEnvFileName(name: string): boolean {
  return name.startsWith(".env");
}

/**
 * Copy `.env*` files (regular files only, non-recursive) from the repository
 * root into a fresh worktree. Git never checks these out. Returns the names copied.
 */
export function copyEnvFiles(repoRoot: string, worktreePath: string): string[] {
  const copied: string[] = [];
  for (const entry of readdirSync(repoRoot, { withFileTypes: true })) {
    if (!entry.isFile() || !isEnvFileName(entry.name)) continue;
    copyFileSync(join(repoRoot, entry.name), join(worktreePath, entry.name));
    log(`copied ${entry.name}`);
    copied.push(entry.name);
  }
  return copied.sort();
}
