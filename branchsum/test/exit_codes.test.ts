import { describe, expect, it } from "vitest";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";

describe("exit codes", () => {
  it("maps error codes to process exit codes", () => {
    expect(exitCodeFor("INVALID_RECORD")).toBe(2);
    expect(exitCodeFor("INVALID_ARGS")).toBe(3);
    expect(exitCodeFor("INPUT_UNREADABLE")).toBe(EXIT.FAILED);
    expect(exitCodeFor("CONFIG_INVALID")).toBe(EXIT.FAILED);
    expect(exitCodeFor("FAILED")).toBe(1);
  });

  it("keeps TESTS_FAILED apart from errors", () => {
    expect(new Set(Object.values(EXIT)).size).toBe(5);
    expect(EXIT.TESTS_FAILED).toBe(4);
  });
});
