import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Worktree } from "../git/parser.js";
import { sandboxIdentity } from "./identity.js";
import {
  resolvePostExit,
  resolvePurge,
  resolveRemove,
  type CleanupOps,
} from "./cleanup.js";

/** In-memory git + Docker. */
class FakeWorld implements CleanupOps {
  containers = new Set<string>();
  worktrees: Worktree[] = [];
  dirtyWorktrees = new Set<string>();
  deleted: Array<{ repoDir: string; branch: string }> = [];
  pruned = 0;
  answers: boolean[] = [];
  questions: string[] = [];

  listWorktrees(): Worktree[] {
    return [...this.worktrees];
  }
  listContainers() {
    return [...this.containers].map((name, i) => ({ id: `id${i}`, name, status: "Up 1 minute" }));
  }
  containerExists(name: string): boolean {
    return this.containers.has(name);
  }
  removeContainer(name: string): boolean {
    return this.containers.delete(name);
  }
  removeWorktree(path: string): boolean {
    if (this.dirtyWorktrees.has(path)) return false;
    const before = this.worktrees.length;
    this.worktrees = this.worktrees.filter((w) => w.path !== path);
    return this.worktrees.length < before;
  }
  worktreeExists(path: string): boolean {
    return this.worktrees.some((w) => w.path === path);
  }
  pruneWorktrees(): boolean {
    this.pruned++;
    return true;
  }
  deleteBranch(repoDir: string, branch: string): boolean {
    this.deleted.push({ repoDir, branch });
    return true;
  }
  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answers.shift() ?? false;
  }
}

const REPO = "/src/myrepo";
const identity = sandboxIdentity(REPO, "feature/auth");

let world: FakeWorld;

beforeEach(() => {
  world = new FakeWorld();
  world.worktrees = [
    { path: REPO, branch: "refs/heads/main" },
    { path: "/src/myrepo__feature-auth", branch: "refs/heads/feature/auth" },
  ];
  world.containers.add("sandbox-myrepo-feature-auth");
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveRemove", () => {
  it("removes both and offers to delete the branch in the main repository", async () => {
    world.answers = [true];
    expect(await resolveRemove(identity, REPO, world)).toBe(0);
    expect(world.containers.size).toBe(0);
    expect(world.worktrees.map((w) => w.path)).toEqual([REPO]);
    expect(world.questions).toEqual(["Delete branch 'feature/auth'?"]);
    expect(world.deleted).toEqual([{ repoDir: REPO, branch: "feature/auth" }]);
  });

  it("keeps the branch when declined", async () => {
    world.answers = [false];
    expect(await resolveRemove(identity, REPO, world)).toBe(0);
    expect(world.deleted).toEqual([]);
  });

  it("succeeds when only the container exists", async () => {
    world.worktrees = [{ path: REPO, branch: "refs/heads/main" }];
    expect(await resolveRemove(identity, REPO, world)).toBe(0);
    expect(world.questions).toEqual([]);
  });

  it("succeeds when only the worktree exists", async () => {
    world.containers.clear();
    expect(await resolveRemove(identity, REPO, world)).toBe(0);
  });

  it("fails when neither exists", async () => {
    world.containers.clear();
    world.worktrees = [{ path: REPO, branch: "refs/heads/main" }];
    expect(await resolveRemove(identity, REPO, world)).toBe(1);
    expect(console.error).toHaveBeenCalledWith("[treebox]", "nothing found to remove for: feature-auth");
  });

  it("reports a worktree git refused to remove", async () => {
    world.dirtyWorktrees.add("/src/myrepo__feature-auth");
    expect(await resolveRemove(identity, REPO, world)).toBe(0);
    expect(console.error).toHaveBeenCalledWith(
      "[treebox]",
      "worktree has local changes, kept: /src/myrepo__feature-auth (use rm --force)",
    );
    expect(world.questions).toEqual([]);
  });

  it("does not offer deletion for a detached worktree", async () => {
    world.worktrees[1] = { path: "/src/myrepo__feature-auth", head: "abc" };
    expect(await resolveRemove(identity, REPO, world)).toBe(0);
    expect(world.questions).toEqual([]);
  });
});

describe("resolvePurge", () => {
  it("removes only this repository's containers and worktrees, then prunes", () => {
    world.containers.add("sandbox-other-feature");
    world.worktrees.push({ path: "/src/other__x", branch: "refs/heads/x" });

    const result = resolvePurge("myrepo", world);

    expect(result).toEqual({
      containers: ["sandbox-myrepo-feature-auth"],
      worktrees: ["/src/myrepo__feature-auth"],
    });
    expect([...world.containers]).toEqual(["sandbox-other-feature"]);
    expect(world.worktrees.map((w) => w.path)).toEqual([REPO, "/src/other__x"]);
    expect(world.pruned).toBe(1);
  });

  it("keeps and reports a worktree with local changes", () => {
    world.dirtyWorktrees.add("/src/myrepo__feature-auth");

    expect(resolvePurge("myrepo", world).worktrees).toEqual([]);
    expect(console.error).toHaveBeenCalledWith(
      "[treebox]",
      "  kept worktree with local changes: /src/myrepo__feature-auth (use rm --force)",
    );
  });

  it("prunes even when there is nothing to remove", () => {
    world.containers.clear();
    world.worktrees = [{ path: REPO }];
    expect(resolvePurge("myrepo", world)).toEqual({ containers: [], worktrees: [] });
    expect(world.pruned).toBe(1);
  });
});

describe("resolvePostExit", () => {
  it("does nothing when the container is already gone", async () => {
    world.containers.clear();
    expect(await resolvePostExit(identity, REPO, world)).toBe(false);
    expect(world.questions).toEqual([]);
  });

  it("keeps the sandbox when teardown is declined", async () => {
    world.answers = [false];
    expect(await resolvePostExit(identity, REPO, world)).toBe(false);
    expect(world.containers.has("sandbox-myrepo-feature-auth")).toBe(true);
    expect(world.questions).toEqual([
      "Remove sandbox 'feature-auth' (container and worktree, uncommitted changes included)?",
    ]);
  });

  it("tears down and deletes the branch when both are accepted", async () => {
    world.answers = [true, true];
    expect(await resolvePostExit(identity, REPO, world)).toBe(true);
    expect(world.containers.size).toBe(0);
    expect(world.deleted).toEqual([{ repoDir: REPO, branch: "feature/auth" }]);
  });
});
