/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_RECORD: 2,
  INVALID_ARGS: 3,
  /** Only with `--fail-on-failure`: some branch has failing tests. */
  TESTS_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export type ErrorCode = "INVALID_RECORD" | "INVALID_ARGS" | "INPUT_UNREADABLE" | "CONFIG_INVALID" | "FAILED";

export function exitCodeFor(code: ErrorCode): ExitCode {
  switch (code) {
    case "INVALID_RECORD":
      return EXIT.INVALID_RECORD;
    case "INVALID_ARGS":
      return EXIT.INVALID_ARGS;
    default:
      return EXIT.FAILED;
  }
}
