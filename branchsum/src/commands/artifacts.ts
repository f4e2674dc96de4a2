import { collectMatrix } from "../artifacts/collect.js";
import { SummaryArchive } from "../artifacts/archive.js";
import { commitMessage, discoverBranches, recentBranchHashes, sanitizeBranchName } from "../git/log.js";
import type { GitRepository } from "../git/operations.js";
import { logger } from "../logger.js";
import { renderMatrix } from "../render/matrix.js";
import { isInvalidRecordError } from "../summary/errors.js";
import { SummaryWriter, type WrittenFilesReport } from "../writer/writer.js";
import type { ErrorCode } from "./exit-codes.js";
import type { ArtifactsConfig } from "../types/config.js";

export type JobRequest = {
  machine: string;
  branch: string;
  /** How many recent hashes to summarize. */
  qty: number;
};

export type ArtifactsOptions = {
  machines: string[];
  /** Branches to summarize; discovered from the artifact log when empty. */
  branches?: string[];
  history: number;
  outputDir: string;
  push?: boolean;
  remote: string;
  config: ArtifactsConfig;
};

export type ArtifactsDeps = {
  /** Checkout of the test-artifacts repository. */
  artifacts: GitRepository;
  /** Repository holding `outputDir`; required with `push`. */
  summaries?: GitRepository;
};

export type SkippedHash = { branch: string; machine: string; hash: string };

export type ArtifactsResult =
  | { ok: true; report: WrittenFilesReport; rows: number; skipped: SkippedHash[] }
  | { ok: false; code: ErrorCode; error: string };

/** Every machine paired with every branch, machines outermost. */
export function jobRequests(machines: readonly string[], branches: readonly string[], qty: number): JobRequest[] {
  return machines.flatMap((machine) => branches.map((branch) => ({ machine, branch, qty })));
}

async function resolveBranches(opts: ArtifactsOptions, repo: GitRepository): Promise<string[]> {
  if (opts.branches && opts.branches.length > 0) return opts.branches;
  const branches = discoverBranches(await repo.log("--all", "--format=%B"));
  logger.info(`discovered ${branches.length} branches from the artifact log`, "artifacts");
  return branches;
}

/**
 * Summarize the most recent hashes of each branch on each machine into
 * build-matrix tables, one per branch and hash, under `outputDir`.
 */
export async function runArtifactsJob(opts: ArtifactsOptions, deps: ArtifactsDeps): Promise<ArtifactsResult> {
  if (opts.push && !deps.summaries) {
    return { ok: false, code: "INVALID_ARGS", error: "Pushing requires a summaries repository" };
  }

  const repo = deps.artifacts;
  const archive = new SummaryArchive();
  const latest = new Map<string, string>();
  const tables = new Map<string, { branch: string; dir: string; hash: string }>();
  const skipped: SkippedHash[] = [];

  try {
    await repo.fetch();
    const branches = await resolveBranches(opts, repo);

    for (const job of jobRequests(opts.machines, branches, opts.history)) {
      logger.info(`generating summaries for ${job.branch} [${job.machine}]`, "artifacts");
      await repo.checkout(job.machine);
      await repo.pull();
      logger.debug(`artifacts ${job.machine} at ${await repo.getCurrentSha()}`, "artifacts");

      const logText = await repo.log("--format=%B", `origin/${job.machine}`);
      const hashes = recentBranchHashes(logText, job.branch, job.machine, job.qty);
      if (hashes.length === 0) {
        logger.warn(`no hashes found for ${job.branch} on ${job.machine}`, "artifacts");
      }

      for (const [idx, hash] of hashes.entries()) {
        const rows = await collectMatrix({ repo, hash, branch: job.branch, machine: job.machine }, opts.config);
        if (rows.length === 0) {
          logger.info(`missing summary data for ${hash}, ${job.branch} [${job.machine}]`, "artifacts");
          skipped.push({ branch: job.branch, machine: job.machine, hash });
          continue;
        }
        const dir = sanitizeBranchName(job.branch);
        const table = `${dir}/${hash}`;
        tables.set(table, { branch: job.branch, dir, hash });
        const total = archive.add(table, rows);
        logger.debug(`table ${table} holds ${total} rows`, "artifacts");
        // the newest hash of the last machine processed for a branch wins
        if (idx === 0) latest.set(dir, hash);
      }
    }
  } catch (e) {
    if (isInvalidRecordError(e)) return { ok: false, code: "INVALID_RECORD", error: e.message };
    return { ok: false, code: "FAILED", error: (e as Error).message };
  }

  const writer = new SummaryWriter(opts.outputDir);
  const suites = opts.config.suites;
  const render = { artifactsUrl: opts.config.repo_url };
  try {
    for (const [table, { branch, dir, hash }] of tables) {
      const rows = archive.rowsFor(table);
      writer.write(`${table}.md`, renderMatrix(rows, suites, "markdown", render));
      writer.write(`${table}.csv`, renderMatrix(rows, suites, "csv", render));
      if (latest.get(dir) === hash) {
        writer.write(`${dir}/-latest.md`, renderMatrix(rows, suites, "markdown", render));
      }
      if (opts.push && deps.summaries) {
        await deps.summaries.addAll();
        await deps.summaries.commit(commitMessage(branch, hash));
      }
    }

    if (opts.push && deps.summaries) {
      const branch = await deps.summaries.getCurrentBranch();
      logger.info(`pushing summaries to ${opts.remote}/${branch}`, "artifacts");
      await deps.summaries.push(opts.remote, branch);
    }
  } catch (e) {
    return { ok: false, code: "FAILED", error: (e as Error).message };
  }

  return { ok: true, report: writer.report(), rows: archive.size, skipped };
}
