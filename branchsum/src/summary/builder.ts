import { InvalidRecordError } from "./errors.js";
import {
  TEST_STATUSES,
  type BranchSummary,
  type RawTestResult,
  type StatusCounts,
  type SummaryTotals,
  type TestResult,
  type TestStatus,
} from "../types/test-result.js";

function isTestStatus(value: string): value is TestStatus {
  return (TEST_STATUSES as readonly string[]).includes(value);
}

function emptyCounts(): StatusCounts {
  return { pass: 0, fail: 0, skip: 0 };
}

/** Code-unit comparison; `localeCompare` would make the order depend on the host locale. */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Sum in ascending order so that any permutation of the same values gives the same float. */
function stableSum(values: number[]): number {
  return [...values].sort((a, b) => a - b).reduce((sum, v) => sum + v, 0);
}

/**
 * Check one adapter record and return it as a TestResult.
 * Throws InvalidRecordError naming the first field that is wrong.
 */
export function validateRecord(record: RawTestResult, index: number): TestResult {
  const { branch, test, status, duration } = record;

  if (typeof branch !== "string" || branch.length === 0) {
    throw new InvalidRecordError(`Record ${index}: branch name is missing`, { index, field: "branch" });
  }
  if (typeof test !== "string") {
    throw new InvalidRecordError(`Record ${index}: test name must be a string`, { index, field: "test" });
  }
  if (typeof status !== "string" || !isTestStatus(status)) {
    throw new InvalidRecordError(
      `Record ${index}: unrecognized status '${String(status)}' (expected ${TEST_STATUSES.join("|")})`,
      { index, field: "status" },
    );
  }
  if (typeof duration !== "number" || !Number.isFinite(duration) || duration < 0) {
    throw new InvalidRecordError(
      `Record ${index}: duration must be a non-negative number, got ${String(duration)}`,
      { index, field: "duration" },
    );
  }

  return Object.freeze({ branch, test, status, duration });
}

/**
 * Group test results by branch and count them per status.
 *
 * Every record is validated before anything is aggregated, so a single bad
 * record yields no output at all. The result is ordered by branch name.
 */
export function buildBranchSummaries(records: readonly RawTestResult[]): BranchSummary[] {
  const results = records.map((r, i) => validateRecord(r, i));

  const groups = new Map<string, { counts: StatusCounts; durations: number[] }>();
  for (const result of results) {
    let group = groups.get(result.branch);
    if (!group) {
      group = { counts: emptyCounts(), durations: [] };
      groups.set(result.branch, group);
    }
    group.counts[result.status]++;
    group.durations.push(result.duration);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([branch, { counts, durations }]) => ({
      branch,
      counts,
      total: counts.pass + counts.fail + counts.skip,
      duration: stableSum(durations),
    }));
}

/** Totals across all branch summaries. */
export function totalsOf(summaries: readonly BranchSummary[]): SummaryTotals {
  const counts = emptyCounts();
  for (const s of summaries) {
    for (const status of TEST_STATUSES) {
      counts[status] += s.counts[status];
    }
  }
  return {
    branches: summaries.length,
    counts,
    total: counts.pass + counts.fail + counts.skip,
    duration: stableSum(summaries.map((s) => s.duration)),
  };
}
