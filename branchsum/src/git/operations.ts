import { simpleGit, type SimpleGit } from "simple-git";
import { logger } from "../logger.js";

/** The git commands the summary jobs need; GitOperations is the real one. */
export interface GitRepository {
  readonly repoPath: string;
  fetch(): Promise<void>;
  checkout(ref: string): Promise<void>;
  pull(): Promise<void>;
  log(...args: string[]): Promise<string>;
  addAll(): Promise<void>;
  commit(message: string): Promise<void>;
  push(remote: string, branch?: string): Promise<void>;
  getCurrentBranch(): Promise<string>;
  getCurrentSha(ref?: string): Promise<string>;
}

/** Errors whose stderr only warns; the command is treated as having succeeded. */
const WARNINGS = ["not something we can merge", "nothing to commit"];

/**
 * Git operations wrapper: abstracts simple-git for testability.
 */
export class GitOperations implements GitRepository {
  private git: SimpleGit;

  constructor(readonly repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Run a git command; returns false when git only warned and nothing was done. */
  private async run(label: string, op: () => Promise<unknown>): Promise<boolean> {
    logger.debug(`running git ${label}`, "git", { cwd: this.repoPath });
    try {
      await op();
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (WARNINGS.some((w) => message.includes(w))) {
        logger.warn(message, "git");
        return false;
      }
      throw err;
    }
  }

  async fetch(): Promise<void> {
    await this.run("fetch", () => this.git.fetch());
  }

  async checkout(ref: string): Promise<void> {
    await this.run(`checkout ${ref}`, () => this.git.checkout(ref));
  }

  async pull(): Promise<void> {
    await this.run("pull", () => this.git.pull());
  }

  async log(...args: string[]): Promise<string> {
    let output = "";
    await this.run(`log ${args.join(" ")}`, async () => {
      output = await this.git.raw(["log", ...args]);
    });
    return output;
  }

  async addAll(): Promise<void> {
    await this.run("add --all", () => this.git.add(["--all"]));
  }

  async commit(message: string): Promise<void> {
    await this.run("commit", () => this.git.commit(message));
  }

  async push(remote: string, branch?: string): Promise<void> {
    await this.run(`push ${remote}`, () => this.git.push(remote, branch));
  }

  async getCurrentBranch(): Promise<string> {
    const result = await this.git.revparse(["--abbrev-ref", "HEAD"]);
    return result.trim();
  }

  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.git.revparse([ref]);
    return result.trim();
  }
}
