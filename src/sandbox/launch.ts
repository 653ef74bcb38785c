import { join } from "node:path";
import { CONTAINER_HOME } from "../config/defaults.js";
import type { ResolvedConfig } from "../config/schema.js";
import type { ContainerState } from "../docker/parser.js";
import { expandHome } from "../sync/files.js";

export interface Mount {
  source: string;
  target: string;
  readOnly: boolean;
}

export interface ContainerSpec {
  name: string;
  image: string;
  mounts: Mount[];
  env: Record<string, string>;
  /** Host ports, each published to the same container port. */
  ports: number[];
  workdir: string;
  command: string[];
}

export type LaunchPlan =
  | { kind: "run"; workdir: string; container: ContainerSpec }
  | {
      kind: "exec";
      workdir: string;
      containerName: string;
      /** Container exists but is stopped: `docker start` first. */
      start: boolean;
      command: string[];
    };

export interface LaunchRequest {
  containerName: string;
  repoName: string;
  mainGitDir: string;
  worktreePath: string;
  /** Image for a new container; defaults to `sandbox-template:<repo>`. */
  image?: string;
  resume: boolean;
  home: string;
  config: ResolvedConfig;
}

export interface LaunchDeps {
  containerState(name: string): ContainerState;
  allocatePorts(count: number, rangeStart: number, rangeEnd: number): Promise<number[]>;
  ghToken(): string;
}

export function agentCommand(agent: ResolvedConfig["agent"], resume: boolean): string[] {
  return [agent.binary, ...agent.defaultArgs, ...(resume ? agent.resumeArgs : [])];
}

export function portsInstruction(ports: number[]): string {
  return (
    `Ports ${ports.join(", ")} of this container are published to the same ports on the host. ` +
    "Dev servers must listen on 0.0.0.0 (not localhost) and use one of these ports to be reachable from the host."
  );
}

function baseMounts(req: LaunchRequest): Mount[] {
  const { home, worktreePath, mainGitDir } = req;
  return [
    { source: worktreePath, target: worktreePath, readOnly: false },
    // Same path inside and out, so commits made in the sandbox land in the host repository.
    { source: mainGitDir, target: mainGitDir, readOnly: false },
    { source: join(home, ".claude"), target: `${CONTAINER_HOME}/.claude`, readOnly: false },
    { source: join(home, ".config", "gh"), target: `${CONTAINER_HOME}/.config/gh`, readOnly: true },
    { source: join(home, ".ssh"), target: `${CONTAINER_HOME}/.ssh`, readOnly: true },
  ];
}

function configMounts(req: LaunchRequest): Mount[] {
  return req.config.mounts.map((m) => {
    const source = expandHome(m.location, req.home);
    return { source, target: m.mountPoint ?? source, readOnly: !m.writable };
  });
}

/**
 * Decide how to get the user into the sandbox's container:
 * exec into a running one, start-then-exec a stopped one, or run a new one.
 */
export async function buildLaunch(req: LaunchRequest, deps: LaunchDeps): Promise<LaunchPlan> {
  const { config } = req;
  const state = deps.containerState(req.containerName);

  if (state !== "") {
    return {
      kind: "exec",
      workdir: req.worktreePath,
      containerName: req.containerName,
      start: state === "stopped",
      command: agentCommand(config.agent, req.resume),
    };
  }

  const ports = await deps.allocatePorts(config.ports, config.portRange.start, config.portRange.end);

  const env: Record<string, string> = {
    GH_TOKEN: deps.ghToken(),
    CLAUDE_CONFIG_DIR: `${CONTAINER_HOME}/.claude`,
    FORCE_COLOR: "1",
    COLORTERM: "truecolor",
    ...config.env,
  };
  const command = agentCommand(config.agent, req.resume);
  if (ports.length > 0) {
    env.SANDBOX_PORTS = ports.join(",");
    if (config.agent.systemPromptFlag) {
      command.push(config.agent.systemPromptFlag, portsInstruction(ports));
    }
  }

  return {
    kind: "run",
    workdir: req.worktreePath,
    container: {
      name: req.containerName,
      image: req.image ?? `sandbox-template:${req.repoName}`,
      mounts: [...baseMounts(req), ...configMounts(req)],
      env,
      ports,
      workdir: req.worktreePath,
      command,
    },
  };
}

export function runArgs(spec: ContainerSpec): string[] {
  return [
    "docker",
    "run",
    "-it",
    "--name",
    spec.name,
    ...spec.ports.flatMap((p) => ["-p", `${p}:${p}`]),
    ...spec.mounts.flatMap((m) => ["-v", `${m.source}:${m.target}${m.readOnly ? ":ro" : ""}`]),
    ...Object.entries(spec.env).flatMap(([k, v]) => ["-e", `${k}=${v}`]),
    "-w",
    spec.workdir,
    spec.image,
    ...spec.command,
  ];
}

/**
 * One argv per step; steps run in sequence, each only if the previous succeeded.
 */
export function launchSteps(plan: LaunchPlan): string[][] {
  if (plan.kind === "run") return [runArgs(plan.container)];
  const exec = ["docker", "exec", "-it", plan.containerName, ...plan.command];
  return plan.start ? [["docker", "start", plan.containerName], exec] : [exec];
}

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * The single place a plan becomes text: a command line for the wrapping shell.
 */
export function toCommandLine(plan: LaunchPlan): string {
  return launchSteps(plan)
    .map((argv) => argv.map(shellQuote).join(" "))
    .join(" && ");
}
