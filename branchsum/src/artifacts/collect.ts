import fs from "node:fs";
import path from "node:path";
import { isBuildPassing, jobAttributesFromPath } from "./build-log.js";
import { findArtifactFiles } from "./find.js";
import { buildMatrix } from "./matrix.js";
import { parseSummaryDat } from "./summary-dat.js";
import { artifactCommitArgs, parseArtifactCommit, sanitizeBranchName } from "../git/log.js";
import type { GitRepository } from "../git/operations.js";
import { logger } from "../logger.js";
import type { ArtifactCommit, BuildLogResult, MatrixRow, SummaryDat } from "../types/artifacts.js";
import type { ArtifactsConfig } from "../types/config.js";

export type CollectRequest = {
  repo: GitRepository;
  hash: string;
  branch: string;
  machine: string;
};

/**
 * Scan an artifacts checkout for the summary.dat and build.log files of one
 * branch, machine and hash, and join them into matrix rows. Each row carries
 * the artifacts commit that last touched its summary file.
 */
export async function collectMatrix(req: CollectRequest, cfg: ArtifactsConfig): Promise<MatrixRow[]> {
  const root = path.resolve(req.repo.repoPath);
  const pathIncludes = [sanitizeBranchName(req.branch), req.machine];
  const search = { pathIncludes, contentIncludes: [req.hash], ignore: cfg.ignore, encoding: cfg.file_encoding };

  const logPaths = findArtifactFiles(root, { ...search, fileName: cfg.build_log_file });
  logger.debug(`matching logs: ${logPaths.length}`, "collect", { hash: req.hash });
  if (logPaths.length === 0) {
    logger.warn(`no ${cfg.build_log_file} found containing ${req.hash}, no build data can be collected`, "collect");
  }

  const summaryPaths = findArtifactFiles(root, { ...search, fileName: cfg.summary_file });
  logger.debug(`matching summaries: ${summaryPaths.length}`, "collect", { hash: req.hash });
  if (summaryPaths.length === 0) {
    logger.warn(`no ${cfg.summary_file} found containing ${req.hash}; no test data can be collected`, "collect");
  }

  const builds: BuildLogResult[] = [];
  for (const logPath of logPaths) {
    const attributes = jobAttributesFromPath(logPath);
    if (!attributes) {
      logger.debug("build log path too short for job attributes", "collect", { source: logPath });
      continue;
    }
    const content = fs.readFileSync(logPath, cfg.file_encoding);
    builds.push({
      source: logPath,
      attributes,
      passed: isBuildPassing(content, cfg.build_success_message, cfg.build_log_tail_lines),
    });
  }

  const summaries: SummaryDat[] = [];
  for (const summaryPath of summaryPaths) {
    const parsed = parseSummaryDat(fs.readFileSync(summaryPath, cfg.file_encoding), summaryPath);
    if (parsed) summaries.push(parsed);
  }

  const commits = new Map<string, ArtifactCommit>();
  for (const summary of summaries) {
    const rel = path.relative(root, summary.source).split(path.sep).join("/");
    commits.set(summary.source, parseArtifactCommit(await req.repo.log(...artifactCommitArgs(rel))));
  }

  return buildMatrix(summaries, builds, req.hash, commits);
}
