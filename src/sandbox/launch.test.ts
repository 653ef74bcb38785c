import { describe, it, expect, vi } from "vitest";
import { resolveConfig } from "../config/loader.js";
import type { ContainerState } from "../docker/parser.js";
import {
  buildLaunch,
  portsInstruction,
  shellQuote,
  toCommandLine,
  type LaunchDeps,
  type LaunchRequest,
} from "./launch.js";

function makeRequest(overrides: Partial<LaunchRequest> = {}): LaunchRequest {
  return {
    containerName: "sandbox-repo-x",
    repoName: "repo",
    mainGitDir: "/src/repo/.git",
    worktreePath: "/src/repo__x",
    image: "treebox:latest",
    resume: false,
    home: "/home/tester",
    config: resolveConfig({}, {}),
    ...overrides,
  };
}

function makeDeps(state: ContainerState, ports: number[] = [49152, 49153, 49154]) {
  return {
    containerState: vi.fn<LaunchDeps["containerState"]>().mockReturnValue(state),
    allocatePorts: vi.fn<LaunchDeps["allocatePorts"]>().mockResolvedValue(ports),
    ghToken: vi.fn<LaunchDeps["ghToken"]>().mockReturnValue("test-token"),
  };
}

describe("buildLaunch for an existing container", () => {
  it("execs into a running container", async () => {
    const deps = makeDeps("running");
    const plan = await buildLaunch(makeRequest(), deps);
    expect(toCommandLine(plan)).toBe(
      "docker exec -it sandbox-repo-x claude --dangerously-skip-permissions",
    );
    expect(plan.workdir).toBe("/src/repo__x");
    expect(deps.allocatePorts).not.toHaveBeenCalled();
    expect(deps.ghToken).not.toHaveBeenCalled();
  });

  it("starts a stopped container first and resumes the session", async () => {
    const plan = await buildLaunch(makeRequest({ resume: true }), makeDeps("stopped"));
    expect(toCommandLine(plan)).toBe(
      "docker start sandbox-repo-x && docker exec -it sandbox-repo-x claude --dangerously-skip-permissions --continue",
    );
  });
});

describe("buildLaunch for a new container", () => {
  it("allocates ports from the configured range", async () => {
    const deps = makeDeps("");
    await buildLaunch(makeRequest(), deps);
    expect(deps.allocatePorts).toHaveBeenCalledWith(3, 49152, 65535);
  });

  it("builds the full container spec", async () => {
    const plan = await buildLaunch(makeRequest(), makeDeps(""));
    if (plan.kind !== "run") throw new Error("expected a run plan");
    const { container } = plan;

    expect(container.name).toBe("sandbox-repo-x");
    expect(container.image).toBe("treebox:latest");
    expect(container.workdir).toBe("/src/repo__x");
    expect(container.ports).toEqual([49152, 49153, 49154]);
    expect(container.mounts).toEqual([
      { source: "/src/repo__x", target: "/src/repo__x", readOnly: false },
      { source: "/src/repo/.git", target: "/src/repo/.git", readOnly: false },
      { source: "/home/tester/.claude", target: "/home/agent/.claude", readOnly: false },
      { source: "/home/tester/.config/gh", target: "/home/agent/.config/gh", readOnly: true },
      { source: "/home/tester/.ssh", target: "/home/agent/.ssh", readOnly: true },
    ]);
    expect(container.env).toEqual({
      GH_TOKEN: "test-token",
      CLAUDE_CONFIG_DIR: "/home/agent/.claude",
      FORCE_COLOR: "1",
      COLORTERM: "truecolor",
      SANDBOX_PORTS: "49152,49153,49154",
    });
    expect(container.command).toEqual([
      "claude",
      "--dangerously-skip-permissions",
      "--append-system-prompt",
      portsInstruction([49152, 49153, 49154]),
    ]);
  });

  it("mentions every port and 0.0.0.0 in the instruction", () => {
    const text = portsInstruction([49152, 49153]);
    expect(text.startsWith("Ports 49152, 49153 of this container")).toBe(true);
    expect(text).toContain("0.0.0.0");
  });

  it("serializes publish, mount and env flags in order", async () => {
    const plan = await buildLaunch(makeRequest(), makeDeps("", []));
    expect(toCommandLine(plan)).toBe(
      [
        "docker run -it --name sandbox-repo-x",
        "-v /src/repo__x:/src/repo__x",
        "-v /src/repo/.git:/src/repo/.git",
        "-v /home/tester/.claude:/home/agent/.claude",
        "-v /home/tester/.config/gh:/home/agent/.config/gh:ro",
        "-v /home/tester/.ssh:/home/agent/.ssh:ro",
        "-e GH_TOKEN=test-token",
        "-e CLAUDE_CONFIG_DIR=/home/agent/.claude",
        "-e FORCE_COLOR=1",
        "-e COLORTERM=truecolor",
        "-w /src/repo__x",
        "treebox:latest claude --dangerously-skip-permissions",
      ].join(" "),
    );
  });

  it("skips SANDBOX_PORTS and the instruction when no port is free", async () => {
    const plan = await buildLaunch(makeRequest(), makeDeps("", []));
    if (plan.kind !== "run") throw new Error("expected a run plan");
    expect(plan.container.env.SANDBOX_PORTS).toBeUndefined();
    expect(plan.container.command).toEqual(["claude", "--dangerously-skip-permissions"]);
  });

  it("publishes each port to the same container port", async () => {
    const plan = await buildLaunch(makeRequest(), makeDeps("", [50001]));
    expect(toCommandLine(plan)).toContain(" -p 50001:50001 ");
  });

  it("omits the instruction when the prompt flag is disabled", async () => {
    const config = resolveConfig({ agent: { binary: "codex", defaultArgs: [], systemPromptFlag: "" } });
    const plan = await buildLaunch(makeRequest({ config }), makeDeps("", [50001]));
    if (plan.kind !== "run") throw new Error("expected a run plan");
    expect(plan.container.command).toEqual(["codex"]);
    expect(plan.container.env.SANDBOX_PORTS).toBe("50001");
  });

  it("adds configured mounts and env", async () => {
    const config = resolveConfig({
      env: { TZ: "UTC" },
      mounts: [
        { location: "~/datasets", mountPoint: "/mnt/datasets" },
        { location: "/opt/cache", writable: true },
      ],
    });
    const plan = await buildLaunch(makeRequest({ config }), makeDeps("", []));
    if (plan.kind !== "run") throw new Error("expected a run plan");
    expect(plan.container.mounts.slice(5)).toEqual([
      { source: "/home/tester/datasets", target: "/mnt/datasets", readOnly: true },
      { source: "/opt/cache", target: "/opt/cache", readOnly: false },
    ]);
    expect(plan.container.env.TZ).toBe("UTC");
  });

  it("falls back to the repository template image", async () => {
    const plan = await buildLaunch(makeRequest({ image: undefined }), makeDeps("", []));
    if (plan.kind !== "run") throw new Error("expected a run plan");
    expect(plan.container.image).toBe("sandbox-template:repo");
  });
});

describe("shellQuote", () => {
  it("leaves plain arguments alone", () => {
    expect(shellQuote("--name")).toBe("--name");
    expect(shellQuote("/a/b:/c:ro")).toBe("/a/b:/c:ro");
  });

  it("quotes spaces", () => {
    expect(shellQuote("hello world")).toBe("'hello world'");
  });

  it("escapes single quotes", () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  it("quotes the empty string", () => {
    expect(shellQuote("")).toBe("''");
  });
});
