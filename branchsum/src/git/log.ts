/** Parsing of artifact-repository commit messages. */
import type { ArtifactCommit } from "../types/artifacts.js";

const HASH_PATTERNS = [/ESMF_\S*/, /v\S*\.\S*\.\S*/];

const BRANCH_PATTERN = /(_[Og]_)(.*)(\swith.*)/;

/** `feature/x` → `feature_x`, the form branch names take in artifact paths. */
export function sanitizeBranchName(name: string): string {
  return name.replace(/\//g, "_");
}

/**
 * Extract the framework build hash from a commit message, e.g.
 * `ESMF_8_3_0_beta_snapshot_07-g8913088` or `v8.3.0b07-12-g8913088`.
 * Returns "" when the message names none.
 */
export function parseArtifactHash(text: string): string {
  for (const pattern of HASH_PATTERNS) {
    const m = pattern.exec(text);
    if (m) return m[0];
  }
  return "";
}

/**
 * Branch named in a message such as
 * `update for test of gfortran_8.3.0_mpiuni_O_develop with hash v8.3.0b08-5-g64eb133 on discover`.
 */
export function extractBranchFromLogLine(line: string): string {
  const m = BRANCH_PATTERN.exec(line);
  return m ? m[2] : "";
}

function lines(logText: string): string[] {
  return logText.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
}

/** Branch names mentioned anywhere in a log, sorted. */
export function discoverBranches(logText: string): string[] {
  const branches = new Set<string>();
  for (const line of lines(logText)) {
    const branch = extractBranchFromLogLine(line);
    if (branch) branches.add(branch);
  }
  return [...branches].sort();
}

/**
 * Most recent distinct hashes tested for `branch` on `machine`, newest first,
 * from `git log --format=%B` output.
 */
export function recentBranchHashes(logText: string, branch: string, machine: string, qty: number): string[] {
  const sanitized = sanitizeBranchName(branch);
  const hashes: string[] = [];
  for (const line of lines(logText)) {
    if (!line.includes(sanitized) || !line.includes(machine)) continue;
    const hash = parseArtifactHash(line);
    if (hash && !hashes.includes(hash)) hashes.push(hash);
    if (hashes.length >= qty) break;
  }
  return hashes;
}

export function commitMessage(branch: string, hash: string): string {
  return `updated summary for hash ${hash} on ${branch}`;
}

/** `git log` arguments for the last commit touching `file`: hash and committer date, tab-separated. */
export function artifactCommitArgs(file: string): string[] {
  return ["-1", "--format=%H%x09%cI", "--", file];
}

export function parseArtifactCommit(logText: string): ArtifactCommit {
  const [first = ""] = lines(logText);
  const [commit = "", modified = ""] = first.split("\t");
  return { commit: commit.trim(), modified: modified.trim() };
}
