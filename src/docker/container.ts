import { execCapture, execInherit } from "../utils/process.js";
import {
  parseContainerList,
  parseEnvValue,
  parseListeningPorts,
  parseRunningFlag,
  type ContainerState,
  type ContainerSummary,
} from "./parser.js";

export const CONTAINER_PREFIX = "sandbox-";

export function listContainers(prefix: string = CONTAINER_PREFIX): ContainerSummary[] {
  const result = execCapture("docker", [
    "ps",
    "-a",
    "--filter",
    `name=${prefix}`,
    "--format",
    "{{.ID}}\t{{.Names}}\t{{.Status}}",
  ]);
  if (result.status !== 0) return [];
  return parseContainerList(result.stdout);
}

export function getContainerState(name: string): ContainerState {
  const result = execCapture("docker", ["container", "inspect", "-f", "{{.State.Running}}", name]);
  if (result.status !== 0) return "";
  return parseRunningFlag(result.stdout);
}

export function containerExists(name: string): boolean {
  return getContainerState(name) !== "";
}

export function getContainerEnv(name: string, key: string): string {
  const result = execCapture("docker", ["container", "inspect", "-f", "{{json .Config.Env}}", name]);
  if (result.status !== 0) return "";
  return parseEnvValue(result.stdout, key);
}

export function removeContainer(name: string): boolean {
  return execCapture("docker", ["rm", "-f", name]).status === 0;
}

/**
 * TCP ports listening inside a running container. Empty if the container is
 * stopped or `ss` is unavailable in the image.
 */
export function listListeningPorts(name: string): number[] {
  const result = execCapture("docker", ["exec", name, "ss", "-ltnH"]);
  if (result.status !== 0) return [];
  return parseListeningPorts(result.stdout);
}

export function imageExists(tag: string): boolean {
  return execCapture("docker", ["image", "inspect", tag]).status === 0;
}

export function buildImage(tag: string, dockerfile: string, context: string): boolean {
  return execInherit("docker", ["build", "-t", tag, "-f", dockerfile, context]) === 0;
}
