import { beforeEach, describe, expect, it, vi } from "vitest";
import { GitOperations } from "../src/git/operations.js";
import { configureLogger } from "../src/logger.js";

const git = vi.hoisted(() => ({
  fetch: vi.fn(),
  checkout: vi.fn(),
  pull: vi.fn(),
  raw: vi.fn(),
  add: vi.fn(),
  commit: vi.fn(),
  push: vi.fn(),
  revparse: vi.fn(),
}));

vi.mock("simple-git", () => ({ simpleGit: () => git }));

describe("GitOperations", () => {
  let lines: string[];

  beforeEach(() => {
    vi.clearAllMocks();
    lines = [];
    configureLogger({ level: "info", format: "human", write: (l) => lines.push(l) });
  });

  it("returns raw log output", async () => {
    git.raw.mockResolvedValue("first\nsecond\n");
    const ops = new GitOperations("/repo");
    expect(await ops.log("--format=%B", "origin/acorn")).toBe("first\nsecond\n");
    expect(git.raw).toHaveBeenCalledWith(["log", "--format=%B", "origin/acorn"]);
  });

  it("checks out a machine branch", async () => {
    git.checkout.mockResolvedValue(undefined);
    await new GitOperations("/repo").checkout("acorn");
    expect(git.checkout).toHaveBeenCalledWith("acorn");
  });

  it("treats 'not something we can merge' as a warning", async () => {
    git.pull.mockRejectedValue(new Error("merge: origin/acorn - not something we can merge"));
    await expect(new GitOperations("/repo").pull()).resolves.toBeUndefined();
    expect(lines).toEqual(["WARN [git] merge: origin/acorn - not something we can merge\n"]);
  });

  it("treats 'nothing to commit' as a warning", async () => {
    git.commit.mockRejectedValue(new Error("nothing to commit, working tree clean"));
    await expect(new GitOperations("/repo").commit("updated summary")).resolves.toBeUndefined();
    expect(lines).toEqual(["WARN [git] nothing to commit, working tree clean\n"]);
  });

  it("propagates other git errors", async () => {
    git.push.mockRejectedValue(new Error("remote rejected"));
    await expect(new GitOperations("/repo").push("origin", "main")).rejects.toThrow("remote rejected");
    expect(git.push).toHaveBeenCalledWith("origin", "main");
  });

  it("reads the current branch", async () => {
    git.revparse.mockResolvedValue("main\n");
    expect(await new GitOperations("/repo").getCurrentBranch()).toBe("main");
    expect(git.revparse).toHaveBeenCalledWith(["--abbrev-ref", "HEAD"]);
  });

  it("reads the commit sha of HEAD", async () => {
    git.revparse.mockResolvedValue("0123456789abcdef0123456789abcdef01234567\n");
    expect(await new GitOperations("/repo").getCurrentSha()).toBe("0123456789abcdef0123456789abcdef01234567");
    expect(git.revparse).toHaveBeenCalledWith(["HEAD"]);
  });

  it("reads the commit sha of another ref", async () => {
    git.revparse.mockResolvedValue("fedcba9876543210fedcba9876543210fedcba98\n");
    expect(await new GitOperations("/repo").getCurrentSha("origin/acorn")).toBe("fedcba9876543210fedcba9876543210fedcba98");
    expect(git.revparse).toHaveBeenCalledWith(["origin/acorn"]);
  });
});
