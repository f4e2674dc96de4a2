export const TEST_STATUSES = ["pass", "fail", "skip"] as const;

export type TestStatus = (typeof TEST_STATUSES)[number];

/** A test outcome as an adapter hands it over; `status` and `duration` are unchecked. */
export type RawTestResult = {
  branch: string;
  test: string;
  status: string;
  duration: number;
};

/** A single test execution outcome. `duration` is in seconds. */
export type TestResult = {
  readonly branch: string;
  readonly test: string;
  readonly status: TestStatus;
  readonly duration: number;
};

export type StatusCounts = Record<TestStatus, number>;

/** Aggregated outcome for one branch, derived from its TestResult entries. */
export type BranchSummary = {
  branch: string;
  counts: StatusCounts;
  total: number;
  duration: number;
};

export type SummaryTotals = {
  branches: number;
  counts: StatusCounts;
  total: number;
  duration: number;
};
