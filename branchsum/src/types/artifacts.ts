/** Test-artifact types: build combinations and the matrix rows built from them. */

/** One build configuration, as named on the `Build for` line of a summary.dat. */
export type BuildCombination = {
  branch: string;
  host: string;
  compiler: string;
  compilerVersion: string;
  mpi: string;
  mpiVersion: string;
  /** Optimized (`O`) or debug (`g`) build. */
  optLevel: string;
  os: string;
};

/** Job attributes derived from an artifact's directory path. */
export type JobAttributes = Omit<BuildCombination, "os">;

/** A pass or fail count; `-1` in the file means queued, a non-number is reported as "fail". */
export type SuiteCell = number | "pending" | "fail";

export type SuiteResult = { pass: SuiteCell; fail: SuiteCell };

export type SummaryDat = {
  source: string;
  combination: BuildCombination;
  suites: Record<string, SuiteResult>;
};

export type BuildLogResult = {
  source: string;
  attributes: JobAttributes;
  passed: boolean;
};

/** Last commit of the artifacts repository that touched a summary file. */
export type ArtifactCommit = {
  commit: string;
  /** Committer date, ISO 8601. */
  modified: string;
};

export type MatrixRow = {
  combination: BuildCombination;
  suites: Record<string, SuiteResult>;
  buildPassed: boolean;
  /** Commit hash of the tested framework build. */
  hash: string;
  source: string;
  /** Empty when the summary file was never committed. */
  artifacts: ArtifactCommit;
};
