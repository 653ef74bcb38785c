export type ContainerState = "running" | "stopped" | "";

export interface ContainerSummary {
  id: string;
  name: string;
  /** Human status column, e.g. "Up 2 hours" or "Exited (0) 1 hour ago". */
  status: string;
}

/**
 * Parse `docker ps -a --format '{{.ID}}\t{{.Names}}\t{{.Status}}'` output.
 * Lines with fewer than three columns are skipped.
 */
export function parseContainerList(output: string): ContainerSummary[] {
  const containers: ContainerSummary[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const cols = line.split("\t");
    if (cols.length < 3) continue;
    containers.push({ id: cols[0], name: cols[1], status: cols[2] });
  }
  return containers;
}

/**
 * Parse `docker container inspect -f '{{.State.Running}}'` output.
 * Only called after the inspect succeeded, so anything but "true" is stopped.
 */
export function parseRunningFlag(output: string): ContainerState {
  return output.trim() === "true" ? "running" : "stopped";
}

/**
 * Find `key` in `docker container inspect -f '{{json .Config.Env}}'` output
 * (a JSON array of `KEY=VALUE` strings). Returns "" when absent or unparsable.
 */
export function parseEnvValue(output: string, key: string): string {
  let entries: unknown;
  try {
    entries = JSON.parse(output.trim());
  } catch {
    return "";
  }
  if (!Array.isArray(entries)) return "";
  const prefix = `${key}=`;
  for (const entry of entries) {
    if (typeof entry === "string" && entry.startsWith(prefix)) {
      return entry.slice(prefix.length);
    }
  }
  return "";
}

/**
 * Parse `ss -ltnH` output into listening TCP ports.
 * Format:
 *   LISTEN 0      511          0.0.0.0:3000       0.0.0.0:*
 *   LISTEN 0      4096            [::]:5173          [::]:*
 */
export function parseListeningPorts(output: string): number[] {
  const ports = new Set<number>();
  for (const line of output.split("\n")) {
    const cols = line.trim().split(/\s+/);
    const local = cols[3];
    if (!local) continue;
    const port = parseInt(local.slice(local.lastIndexOf(":") + 1), 10);
    if (Number.isInteger(port) && port > 0) ports.add(port);
  }
  return [...ports].sort((a, b) => a - b);
}

/**
 * "49152,49153" -> [49152, 49153]. Non-numeric entries are dropped.
 */
export function parsePortList(value: string): number[] {
  return value
    .split(",")
    .map((p) => parseInt(p.trim(), 10))
    .filter((p) => Number.isInteger(p) && p > 0);
}
