import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import { globalConfigPath, loadConfig, LOCAL_CONFIG_NAME } from "./config/loader.js";
import type { ResolvedConfig } from "./config/schema.js";
import * as docker from "./docker/container.js";
import { resolveImage } from "./docker/image.js";
import { parsePortList } from "./docker/parser.js";
import { shortBranchName } from "./git/parser.js";
import * as git from "./git/worktree.js";
import { getGhToken } from "./runtime/credentials.js";
import { allocatePorts } from "./runtime/ports.js";
import { resolvePostExit, resolvePurge, resolveRemove, type CleanupOps } from "./sandbox/cleanup.js";
import { emitDirectives } from "./sandbox/directives.js";
import { containerName, safeName, sandboxIdentity, type SandboxIdentity } from "./sandbox/identity.js";
import { buildLaunch, toCommandLine, type LaunchDeps } from "./sandbox/launch.js";
import { resolveStart, type StartHost, type StartProbes } from "./sandbox/resolver.js";
import { copyEnvFiles } from "./sync/files.js";
import { installAssistantSettings, INSTALLED_PATTERNS } from "./sync/settings.js";
import { error, log } from "./utils/logger.js";
import { confirm, isInteractive } from "./utils/prompt.js";

const SHELL_INIT_PATH = fileURLToPath(new URL("../assets/shell/treebox.sh", import.meta.url));

export interface CliEnv {
  cwd: string;
  home: string;
}

interface RepoContext {
  /** Main repository root, also when invoked from inside a linked worktree. */
  repoRoot: string;
  repoName: string;
  mainGitDir: string;
}

function printUsage(): void {
  const lines = [
    "Usage:",
    "  treebox start [name]          # create or resume a sandbox (random name if omitted)",
    "  treebox attach <name>         # reattach to an existing sandbox container",
    "  treebox ls                    # worktrees and containers of this repository",
    "  treebox rm <name> [--force]   # remove container and worktree",
    "  treebox ports <name>          # ports published by a sandbox",
    "  treebox purge                 # remove every sandbox of this repository",
    "  treebox post-exit <name> <repo>  # teardown prompt (called by the shell function)",
    "  treebox init [--global]       # generate config template",
    "  treebox shell-init            # print the shell function",
    "  treebox --help",
    "",
    "Setup:",
    '  eval "$(treebox shell-init)"   # in ~/.bashrc or ~/.zshrc',
    "",
    "start resolves, in order:",
    "  worktree + container   -> recreate the container, keep the worktree",
    "  worktree only          -> start a container on it",
    "  local branch <name>    -> worktree on that branch",
    "  origin/<name>          -> worktree tracking the remote branch",
    "  otherwise              -> new branch task/<name>",
    "",
    "Naming:",
    "  worktree:  ../<repo>__<name>   (/ in names becomes -)",
    "  container: sandbox-<repo>-<name>",
    "",
    "Config discovery (optional):",
    `  - Local: search upward from the repository root for ${LOCAL_CONFIG_NAME}`,
    "  - Global: ~/.config/treebox/config.yml",
    "  - Merge order: defaults -> global -> local (local wins)",
    "",
    "Config keys (YAML):",
    "  image: <tag>                        # skip Dockerfile.sandbox / default image build",
    "  ports: <n>                          # host ports to publish (default: 3)",
    "  portRange: { start, end }           # default: 49152..65535",
    "  branchPrefix: <prefix>              # default: task/",
    "  fetchRemote: true|false             # fetch before looking for origin/<name>",
    "  env: { KEY: VALUE }                 # merged by key",
    "  mounts: [{ location, mountPoint, writable }]  # local replaces global",
    "  agent: { binary, defaultArgs, resumeArgs, systemPromptFlag }",
  ];
  console.log(lines.join("\n"));
}

const LOCAL_TEMPLATE = `# ${LOCAL_CONFIG_NAME}: project-level config

# image: my-registry/dev:latest   # otherwise Dockerfile.sandbox, then treebox:latest

# ports: 3
# portRange:
#   start: 49152
#   end: 65535

# branchPrefix: "task/"
# fetchRemote: true

# env:
#   NODE_ENV: development

# mounts:
#   - location: "~/datasets"
#     mountPoint: "/mnt/datasets"
#     writable: false
`;

const GLOBAL_TEMPLATE = `# ~/.config/treebox/config.yml: global config (applies to all repositories)

# ports: 3

# env:
#   TZ: UTC

# agent:
#   binary: claude
#   defaultArgs: ["--dangerously-skip-permissions"]
#   resumeArgs: ["--continue"]
#   systemPromptFlag: "--append-system-prompt"
`;

function runInit(args: string[], env: CliEnv): number {
  const isGlobal = args.includes("--global");
  let path: string;
  if (isGlobal) {
    path = globalConfigPath(env.home);
    mkdirSync(dirname(path), { recursive: true });
  } else {
    path = join(requireRepo(env.cwd).repoRoot, LOCAL_CONFIG_NAME);
  }
  if (existsSync(path)) {
    error(`already exists: ${path}`);
    return 1;
  }
  writeFileSync(path, isGlobal ? GLOBAL_TEMPLATE : LOCAL_TEMPLATE, "utf-8");
  log(`created ${path}`);
  return 0;
}

function requireRepo(cwd: string): RepoContext {
  const root = git.getRepoRoot(cwd);
  if (!root) throw new Error("not in a git repository");
  const mainGitDir = git.getMainGitDir(root);
  if (!mainGitDir) throw new Error(`cannot resolve the git directory of ${root}`);
  const repoRoot = git.repoDirFromGitDir(mainGitDir) ?? root;
  return { repoRoot, repoName: basename(repoRoot), mainGitDir };
}

function launchDeps(): LaunchDeps {
  return {
    containerState: docker.getContainerState,
    allocatePorts: (count, start, end) => allocatePorts(count, start, end),
    ghToken: getGhToken,
  };
}

function startProbes(ctx: RepoContext, config: ResolvedConfig) {
  return (identity: SandboxIdentity): StartProbes => ({
    worktreeExists: () => existsSync(identity.worktreePath),
    containerExists: () => docker.containerExists(identity.containerName),
    localBranchExists: () => git.branchExists(ctx.repoRoot, identity.name),
    remoteBranchExists: () =>
      git.remoteBranchExists(ctx.repoRoot, identity.name, { fetch: config.fetchRemote }),
  });
}

function startHost(ctx: RepoContext, config: ResolvedConfig, env: CliEnv) {
  return (identity: SandboxIdentity): StartHost => ({
    removeContainer: docker.removeContainer,
    addWorktree: (path, branch, options) => git.addWorktree(ctx.repoRoot, path, branch, options),
    copyEnvFiles: (worktreePath) => {
      copyEnvFiles(ctx.repoRoot, worktreePath);
    },
    installSettings: (worktreePath) => {
      git.excludeFromWorktrees(ctx.mainGitDir, INSTALLED_PATTERNS);
      installAssistantSettings(worktreePath);
    },
    launch: (resume) =>
      buildLaunch(
        {
          containerName: identity.containerName,
          repoName: ctx.repoName,
          mainGitDir: ctx.mainGitDir,
          worktreePath: identity.worktreePath,
          image: resolveImage(ctx.repoRoot, ctx.repoName, config.image),
          resume,
          home: env.home,
          config,
        },
        launchDeps(),
      ),
  });
}

function cleanupOps(ctx: RepoContext, options: { force: boolean }): CleanupOps {
  return {
    listWorktrees: () => git.listWorktrees(ctx.repoRoot),
    listContainers: () => docker.listContainers(),
    containerExists: docker.containerExists,
    removeContainer: docker.removeContainer,
    removeWorktree: (path) => git.removeWorktree(ctx.repoRoot, path, options),
    worktreeExists: (path) => existsSync(path),
    pruneWorktrees: () => git.pruneWorktrees(ctx.repoRoot),
    deleteBranch: git.deleteBranch,
    confirm: (question) => (isInteractive() ? confirm(question) : Promise.resolve(false)),
  };
}

async function runStart(name: string | undefined, env: CliEnv): Promise<number> {
  const ctx = requireRepo(env.cwd);
  const config = loadConfig(ctx.repoRoot, env.home);
  const { plan, launch } = await resolveStart(
    name,
    { repoRoot: ctx.repoRoot, branchPrefix: config.branchPrefix },
    startProbes(ctx, config),
    startHost(ctx, config, env),
  );
  emitDirectives({
    cd: launch.workdir,
    exec: toCommandLine(launch),
    name: plan.identity.safeName,
    repo: ctx.repoName,
  });
  return 0;
}

async function runAttach(name: string, env: CliEnv): Promise<number> {
  const ctx = requireRepo(env.cwd);
  const config = loadConfig(ctx.repoRoot, env.home);
  const identity = sandboxIdentity(ctx.repoRoot, name);
  if (!docker.containerExists(identity.containerName)) {
    error(`no container for sandbox: ${identity.safeName} (use start)`);
    return 1;
  }
  const launch = await buildLaunch(
    {
      containerName: identity.containerName,
      repoName: ctx.repoName,
      mainGitDir: ctx.mainGitDir,
      worktreePath: identity.worktreePath,
      resume: true,
      home: env.home,
      config,
    },
    launchDeps(),
  );
  emitDirectives({
    cd: launch.workdir,
    exec: toCommandLine(launch),
    name: identity.safeName,
    repo: ctx.repoName,
  });
  return 0;
}

function runList(env: CliEnv): number {
  const ctx = requireRepo(env.cwd);

  console.log("=== Worktrees ===");
  const worktrees = git.listWorktrees(ctx.repoRoot);
  for (const wt of worktrees) {
    console.log(`  ${wt.path}  [${shortBranchName(wt.branch)}]`);
  }
  if (worktrees.length === 0) console.log("  (none)");

  console.log("\n=== Containers ===");
  // Substring match: a repository named `app` also lists `sandbox-myapp-*`.
  const containers = docker.listContainers().filter((c) => c.name.includes(ctx.repoName));
  for (const c of containers) {
    console.log(`  ${c.name}  (${c.status})`);
  }
  if (containers.length === 0) console.log("  (none)");
  return 0;
}

function runPorts(name: string, env: CliEnv): number {
  const ctx = requireRepo(env.cwd);
  const identity = sandboxIdentity(ctx.repoRoot, name);
  const state = docker.getContainerState(identity.containerName);
  if (state === "") {
    error(`no container for sandbox: ${identity.safeName}`);
    return 1;
  }

  const ports = parsePortList(docker.getContainerEnv(identity.containerName, "SANDBOX_PORTS"));
  if (ports.length === 0) {
    console.log("(none)");
    return 0;
  }
  const active = state === "running" ? docker.listListeningPorts(identity.containerName) : [];
  for (const port of ports) {
    console.log(active.includes(port) ? `${port} (active)` : `${port}`);
  }
  return 0;
}

async function runPostExit(name: string, repoName: string, env: CliEnv): Promise<number> {
  // No repository lookup needed to know there is nothing to do.
  if (!docker.containerExists(containerName(repoName, safeName(name)))) return 0;

  const ctx = requireRepo(env.cwd);
  const identity = sandboxIdentity(join(dirname(ctx.repoRoot), repoName), name);
  // The user confirms teardown of the worktree explicitly, local changes included.
  const removedWorktree = await resolvePostExit(identity, ctx.repoRoot, cleanupOps(ctx, { force: true }));
  // The calling shell is still inside the removed worktree.
  if (removedWorktree) emitDirectives({ cd: ctx.repoRoot });
  return 0;
}

function missingArgument(what: string): number {
  error(`missing argument: ${what}`);
  printUsage();
  return 1;
}

export async function dispatch(args: string[], env: CliEnv): Promise<number> {
  const [command, ...rest] = args;
  const positional = rest.filter((a) => !a.startsWith("--"));

  switch (command) {
    case undefined:
      printUsage();
      return 1;
    case "--help":
    case "-h":
    case "help":
      printUsage();
      return 0;
    case "start":
      return runStart(positional[0], env);
    case "attach":
      if (!positional[0]) return missingArgument("name");
      return runAttach(positional[0], env);
    case "ls":
      return runList(env);
    case "rm": {
      if (!positional[0]) return missingArgument("name");
      const ctx = requireRepo(env.cwd);
      const force = rest.includes("--force");
      return resolveRemove(sandboxIdentity(ctx.repoRoot, positional[0]), ctx.repoRoot, cleanupOps(ctx, { force }));
    }
    case "ports":
      if (!positional[0]) return missingArgument("name");
      return runPorts(positional[0], env);
    case "post-exit":
      if (!positional[0] || !positional[1]) return missingArgument("name and repo");
      return runPostExit(positional[0], positional[1], env);
    case "purge": {
      const ctx = requireRepo(env.cwd);
      resolvePurge(ctx.repoName, cleanupOps(ctx, { force: false }));
      return 0;
    }
    case "init":
      return runInit(rest, env);
    case "shell-init":
      process.stdout.write(readFileSync(SHELL_INIT_PATH, "utf-8"));
      return 0;
    default:
      error(`unknown command: ${command}`);
      printUsage();
      return 1;
  }
}

export async function run(argv: string[]): Promise<void> {
  const args = argv.slice(2); // strip node and script path
  let code: number;
  try {
    code = await dispatch(args, { cwd: process.cwd(), home: homedir() });
  } catch (e) {
    error(e instanceof Error ? e.message : String(e));
    code = 1;
  }
  process.exit(code);
}
