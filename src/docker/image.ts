import { existsSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_IMAGE } from "../config/defaults.js";
import { log } from "../utils/logger.js";
import { buildImage, imageExists } from "./container.js";

/** Per-repository image spec, built when present at the repository root. */
export const PROJECT_DOCKERFILE = "Dockerfile.sandbox";

export const BUNDLED_DOCKERFILE_DIR = fileURLToPath(new URL("../../docker", import.meta.url));

/**
 * Pick the image for a new container:
 * configured image → the repository's Dockerfile.sandbox → the bundled image.
 * Throws when the chosen image cannot be built.
 */
export function resolveImage(
  repoRoot: string,
  repoName: string,
  configured?: string,
  bundledDir: string = BUNDLED_DOCKERFILE_DIR,
): string {
  if (configured) return configured;

  const projectDockerfile = join(repoRoot, PROJECT_DOCKERFILE);
  if (existsSync(projectDockerfile)) {
    const tag = `sandbox-template:${repoName}`;
    log(`building ${PROJECT_DOCKERFILE} as ${tag}...`);
    if (!buildImage(tag, projectDockerfile, repoRoot)) {
      throw new Error(`failed to build ${projectDockerfile}`);
    }
    return tag;
  }

  if (imageExists(DEFAULT_IMAGE)) return DEFAULT_IMAGE;

  const bundledDockerfile = join(bundledDir, "Dockerfile");
  if (!existsSync(bundledDockerfile)) {
    throw new Error(`no image available: ${bundledDockerfile} not found`);
  }
  log(`building default image ${DEFAULT_IMAGE}...`);
  if (!buildImage(DEFAULT_IMAGE, bundledDockerfile, bundledDir)) {
    throw new Error(`no image available: building ${DEFAULT_IMAGE} failed`);
  }
  return DEFAULT_IMAGE;
}
