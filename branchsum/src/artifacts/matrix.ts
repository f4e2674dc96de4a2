import type { ArtifactCommit, BuildCombination, BuildLogResult, JobAttributes, MatrixRow, SummaryDat } from "../types/artifacts.js";

const JOB_KEYS = ["branch", "host", "compiler", "compilerVersion", "optLevel", "mpi", "mpiVersion"] as const;

const SORT_KEYS = ["branch", "host", "compiler", "compilerVersion", "mpi", "mpiVersion", "optLevel"] as const;

function jobKey(attrs: JobAttributes): string {
  return JOB_KEYS.map((k) => attrs[k].toLowerCase()).join("\u0000");
}

/** Order by branch, host, compiler, compiler version, mpi, mpi version, then o/g. */
export function compareCombinations(a: BuildCombination, b: BuildCombination): number {
  for (const key of SORT_KEYS) {
    if (a[key] < b[key]) return -1;
    if (a[key] > b[key]) return 1;
  }
  return 0;
}

const UNCOMMITTED: ArtifactCommit = { commit: "", modified: "" };

/**
 * Join each summary with the build result of the same job. A summary whose
 * build log was not found counts as a failed build. `commits` is keyed by
 * summary source path.
 */
export function buildMatrix(
  summaries: readonly SummaryDat[],
  builds: readonly BuildLogResult[],
  hash: string,
  commits: ReadonlyMap<string, ArtifactCommit> = new Map(),
): MatrixRow[] {
  const passed = new Map<string, boolean>();
  for (const build of builds) {
    passed.set(jobKey(build.attributes), build.passed);
  }

  return summaries
    .map((s) => ({
      combination: s.combination,
      suites: s.suites,
      buildPassed: passed.get(jobKey(s.combination)) ?? false,
      hash,
      source: s.source,
      artifacts: commits.get(s.source) ?? UNCOMMITTED,
    }))
    .sort((a, b) => compareCombinations(a.combination, b.combination));
}
