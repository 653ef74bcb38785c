import { cpSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { log } from "../utils/logger.js";

export type SettingsDocument = Record<string, unknown>;

/** Assistant configuration shipped with treebox (settings.json + hooks/). */
export const BUNDLE_DIR = fileURLToPath(new URL("../../assets/claude", import.meta.url));

const SETTINGS_DIR = ".claude";
const SETTINGS_FILE = "settings.json";
const HOOKS_DIR = "hooks";

/** What `installAssistantSettings` writes, as git exclude patterns anchored at the worktree root. */
export const INSTALLED_PATTERNS = [`/${SETTINGS_DIR}/${SETTINGS_FILE}`, `/${SETTINGS_DIR}/${HOOKS_DIR}/`];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeHooks(project: unknown, bundle: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = isRecord(project) ? { ...project } : {};
  for (const [event, bundleHooks] of Object.entries(bundle)) {
    const projectHooks = merged[event];
    if (Array.isArray(projectHooks) && Array.isArray(bundleHooks)) {
      // Project hooks run first.
      merged[event] = [...projectHooks, ...bundleHooks];
    } else {
      merged[event] = bundleHooks;
    }
  }
  return merged;
}

/**
 * Merge the bundled settings into a project's settings document.
 * `hooks` is merged per event (project entries first); every other top-level
 * key takes the bundle's value.
 */
export function mergeSettings(project: SettingsDocument, bundle: SettingsDocument): SettingsDocument {
  const merged: SettingsDocument = { ...project };
  for (const [key, value] of Object.entries(bundle)) {
    if (key === "hooks" && isRecord(value)) {
      merged.hooks = mergeHooks(project.hooks, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

function readSettings(path: string): SettingsDocument {
  if (!existsSync(path)) return {};
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!isRecord(raw)) throw new Error(`${path}: expected a JSON object`);
  return raw;
}

/**
 * Install the assistant bundle into a worktree: merge settings.json and
 * replace the hooks directory wholesale.
 */
export function installAssistantSettings(worktreePath: string, bundleDir: string = BUNDLE_DIR): void {
  const targetDir = join(worktreePath, SETTINGS_DIR);
  const targetSettings = join(targetDir, SETTINGS_FILE);
  mkdirSync(targetDir, { recursive: true });

  const bundleSettings = join(bundleDir, SETTINGS_FILE);
  if (existsSync(bundleSettings)) {
    const merged = mergeSettings(readSettings(targetSettings), readSettings(bundleSettings));
    writeFileSync(targetSettings, JSON.stringify(merged, null, 2) + "\n", "utf-8");
    log(`merged ${SETTINGS_DIR}/${SETTINGS_FILE}`);
  }

  const bundleHooks = join(bundleDir, HOOKS_DIR);
  if (existsSync(bundleHooks)) {
    const targetHooks = join(targetDir, HOOKS_DIR);
    rmSync(targetHooks, { recursive: true, force: true });
    cpSync(bundleHooks, targetHooks, { recursive: true });
    log(`installed ${SETTINGS_DIR}/${HOOKS_DIR}`);
  }
}
