import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { ConfigError, parseFileConfig, type FileConfig, type ResolvedConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "./defaults.js";

export const LOCAL_CONFIG_NAME = "treebox.yml";

export function globalConfigPath(home: string = homedir()): string {
  return join(home, ".config", "treebox", "config.yml");
}

function loadYamlFile(path: string): FileConfig | null {
  if (!existsSync(path)) return null;
  const content = readFileSync(path, "utf-8");
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (e) {
    throw new ConfigError(path, e instanceof Error ? e.message : String(e));
  }
  return parseFileConfig(raw, path);
}

export function loadGlobalConfig(home: string = homedir()): FileConfig {
  return loadYamlFile(globalConfigPath(home)) ?? {};
}

/**
 * Search upward from startDir for treebox.yml
 */
export function findLocalConfigPath(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const candidate = join(dir, LOCAL_CONFIG_NAME);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

export function loadLocalConfig(startDir: string): FileConfig {
  const configPath = findLocalConfigPath(startDir);
  if (!configPath) return {};
  return loadYamlFile(configPath) ?? {};
}

/**
 * Merge: hardcoded defaults → global config → local config
 *
 * - env: merged by key (local wins)
 * - mounts: local replaces global entirely
 * - everything else: local overrides global
 */
export function resolveConfig(local: FileConfig, global: FileConfig = {}): ResolvedConfig {
  const range = {
    start: local.portRange?.start ?? global.portRange?.start ?? DEFAULT_CONFIG.portRange.start,
    end: local.portRange?.end ?? global.portRange?.end ?? DEFAULT_CONFIG.portRange.end,
  };
  if (range.start >= range.end) {
    throw new Error(`invalid portRange: start (${range.start}) must be below end (${range.end})`);
  }

  return {
    image: local.image ?? global.image,
    ports: local.ports ?? global.ports ?? DEFAULT_CONFIG.ports,
    portRange: range,
    branchPrefix: local.branchPrefix ?? global.branchPrefix ?? DEFAULT_CONFIG.branchPrefix,
    fetchRemote: local.fetchRemote ?? global.fetchRemote ?? DEFAULT_CONFIG.fetchRemote,
    env: { ...global.env, ...local.env },
    mounts: local.mounts ?? global.mounts ?? [],
    agent: {
      binary: local.agent?.binary ?? global.agent?.binary ?? DEFAULT_CONFIG.agent.binary,
      defaultArgs:
        local.agent?.defaultArgs ?? global.agent?.defaultArgs ?? DEFAULT_CONFIG.agent.defaultArgs,
      resumeArgs:
        local.agent?.resumeArgs ?? global.agent?.resumeArgs ?? DEFAULT_CONFIG.agent.resumeArgs,
      systemPromptFlag:
        local.agent?.systemPromptFlag ??
        global.agent?.systemPromptFlag ??
        DEFAULT_CONFIG.agent.systemPromptFlag,
    },
  };
}

export function loadConfig(repoRoot: string, home: string = homedir()): ResolvedConfig {
  return resolveConfig(loadLocalConfig(repoRoot), loadGlobalConfig(home));
}
