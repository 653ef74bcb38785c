/**
 * Lines printed on stdout for the shell function installed by `shell-init`.
 * treebox never runs the session itself; the shell does, so it owns the terminal.
 */
export const CD_DIRECTIVE = "__SANDBOX_CD__";
export const EXEC_DIRECTIVE = "__SANDBOX_EXEC__";
export const NAME_DIRECTIVE = "__SANDBOX_NAME__";
export const REPO_DIRECTIVE = "__SANDBOX_REPO__";

export interface Directives {
  cd?: string;
  exec?: string;
  /** Sandbox and repository, passed back to `post-exit` once the session ends. */
  name?: string;
  repo?: string;
}

export function formatDirectives(d: Directives): string[] {
  const lines: string[] = [];
  if (d.cd !== undefined) lines.push(`${CD_DIRECTIVE}:${d.cd}`);
  if (d.exec !== undefined) lines.push(`${EXEC_DIRECTIVE}:${d.exec}`);
  if (d.name !== undefined) lines.push(`${NAME_DIRECTIVE}:${d.name}`);
  if (d.repo !== undefined) lines.push(`${REPO_DIRECTIVE}:${d.repo}`);
  return lines;
}

export function emitDirectives(d: Directives): void {
  for (const line of formatDirectives(d)) console.log(line);
}
