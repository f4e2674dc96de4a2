import { logger } from "../logger.js";
import { InvalidRecordError } from "../summary/errors.js";
import type { BuildCombination, SuiteCell, SuiteResult, SummaryDat } from "../types/artifacts.js";

const QUEUED = -1;

/**
 * Parse the value of a `Build for` line:
 *
 *   Build for = gfortran_10.3.0_mpich3_g_develop, mpi version 8.1.7 on acorn esmf_os: Linux
 *
 * The branch is everything after the fourth underscore, so branch names may
 * themselves contain underscores.
 */
export function parseBuildLine(line: string, source: string): BuildCombination {
  const eq = line.indexOf("=");
  const comma = line.indexOf(",", eq + 1);
  if (eq === -1 || comma === -1) {
    throw new InvalidRecordError(`Malformed build line in ${source}: ${line.trim()}`, { source, field: "build" });
  }

  const group1 = line.slice(eq + 1, comma).trim();
  const group2 = line.slice(comma + 1).trim();

  const parts = group1.split("_");
  const tokens = group2.split(" ");
  if (parts.length < 5 || tokens.length !== 7) {
    throw new InvalidRecordError(`Malformed build line in ${source}: ${line.trim()}`, { source, field: "build" });
  }

  const [compiler, compilerVersion, mpi, optLevel] = parts;
  return {
    branch: parts.slice(4).join("_"),
    host: tokens[4],
    compiler,
    compilerVersion,
    mpi,
    mpiVersion: tokens[2].toLowerCase(),
    optLevel,
    os: tokens[6],
  };
}

function toCell(raw: string): SuiteCell {
  const n = Number(raw);
  return n === QUEUED ? "pending" : n;
}

/**
 * Parse a `<suite> test results\tPASS n\tFAIL m` line. A line without two
 * integer counts is reported with both cells set to "fail".
 */
export function parseResultLine(line: string, source: string): { suite: string; result: SuiteResult } {
  const tab = line.indexOf("\t");
  const key = tab === -1 ? line : line.slice(0, tab);
  const suite = (key.trim().split(/\s+/)[0] ?? "").toLowerCase();

  const value = tab === -1 ? "" : line.slice(tab + 1);
  const counts = value.replace(/PASS|FAIL/g, "").trim().split(/\s+/);
  if (counts.length !== 2 || !counts.every((c) => /^-?\d+$/.test(c))) {
    logger.error(`found no numeric ${suite} test results, setting to fail`, "summary-dat", {
      source,
      line: value.trim(),
    });
    return { suite, result: { pass: "fail", fail: "fail" } };
  }

  return { suite, result: { pass: toCell(counts[0]), fail: toCell(counts[1]) } };
}

/**
 * Parse a summary.dat file. Returns null when the file has no `Build for`
 * line, since its results cannot be attributed to a build.
 */
export function parseSummaryDat(content: string, source: string): SummaryDat | null {
  let combination: BuildCombination | null = null;
  const suites: Record<string, SuiteResult> = {};

  for (const line of content.split(/\r?\n/)) {
    if (line.includes("Build for")) {
      combination = parseBuildLine(line, source);
    }
    if (line.includes("test results")) {
      const { suite, result } = parseResultLine(line, source);
      suites[suite] = result;
    }
  }

  if (!combination) {
    logger.warn("no build line found", "summary-dat", { source });
    return null;
  }
  return { source, combination, suites };
}
