import { beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { summarize } from "../src/commands/summarize.js";
import { configureLogger } from "../src/logger.js";

const FIXTURES = path.resolve(import.meta.dirname, "../fixtures");
const JUNIT = path.join(FIXTURES, "sample-junit.xml");
const JSON_RESULTS = path.join(FIXTURES, "sample-results.json");

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "branchsum-summarize-"));
}

describe("summarize", () => {
  beforeEach(() => {
    configureLogger({ write: () => {} });
  });

  it("aggregates mixed inputs per branch", async () => {
    const res = await summarize({ inputs: [`develop=${JUNIT}`, JSON_RESULTS], branch: "develop", format: "markdown" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;

    expect(res.summaries).toEqual([
      { branch: "develop", counts: { pass: 2, fail: 2, skip: 2 }, total: 6, duration: 2.125 },
      { branch: "feature/login", counts: { pass: 1, fail: 1, skip: 0 }, total: 2, duration: 2 },
      { branch: "main", counts: { pass: 1, fail: 0, skip: 0 }, total: 1, duration: 0.25 },
    ]);
    expect(res.failing).toEqual(["develop", "feature/login"]);
    expect(res.rendered).toBe(
      [
        "| branch | pass | fail | skip | total | duration (s) |",
        "| --- | ---: | ---: | ---: | ---: | ---: |",
        "| develop | 2 | 2 | 2 | 6 | 2.125 |",
        "| feature/login | 1 | 1 | 0 | 2 | 2.000 |",
        "| main | 1 | 0 | 0 | 1 | 0.250 |",
        "",
        "**Total:** 9 tests on 3 branches (4 passed, 3 failed, 2 skipped) in 4.375s",
      ].join("\n"),
    );
    expect(res.outputPath).toBeUndefined();
  });

  it("writes the rendered summary to a file", async () => {
    const output = path.join(tmpDir(), "out", "summary.csv");
    const res = await summarize({ inputs: [`main=${JUNIT}`], format: "csv", output });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.outputPath).toBe(output);
    expect(fs.readFileSync(output, "utf8")).toBe("branch,pass,fail,skip,total,duration (s)\nmain,2,2,1,5,2.125\n");
  });

  it("fails with INVALID_ARGS for no inputs", async () => {
    expect(await summarize({ inputs: [], format: "json" })).toEqual({
      ok: false,
      code: "INVALID_ARGS",
      error: "No test result inputs given",
    });
  });

  it("fails with INPUT_UNREADABLE for a missing file", async () => {
    const res = await summarize({ inputs: ["develop=missing.xml"], format: "json" });
    expect(res).toEqual({ ok: false, code: "INPUT_UNREADABLE", error: "Test result file not found: missing.xml" });
  });

  it("names the source of an invalid record", async () => {
    const file = path.join(tmpDir(), "results.json");
    fs.writeFileSync(
      file,
      JSON.stringify([
        { branch: "main", test: "a", status: "pass", duration: 1 },
        { branch: "main", test: "b", status: "flaky", duration: 1 },
      ]),
    );
    const res = await summarize({ inputs: [`develop=${JUNIT}`, file], format: "markdown" });
    expect(res).toEqual({
      ok: false,
      code: "INVALID_RECORD",
      error: `Record 6: unrecognized status 'flaky' (expected pass|fail|skip) (${file})`,
    });
  });

  it("rejects records without a branch", async () => {
    const res = await summarize({ inputs: [JUNIT], format: "markdown" });
    expect(res).toEqual({ ok: false, code: "INVALID_RECORD", error: `Record 0: branch name is missing (${JUNIT})` });
  });

  it("maps schema failures to INVALID_RECORD", async () => {
    const file = path.join(tmpDir(), "results.json");
    fs.writeFileSync(file, JSON.stringify([{ test: "a", status: "pass" }]));
    const res = await summarize({ inputs: [file], branch: "main", format: "json" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.code).toBe("INVALID_RECORD");
    expect(res.error).toContain("must have required property 'duration'");
  });

  it("maps truncated JUnit XML to INVALID_RECORD", async () => {
    const file = path.join(tmpDir(), "junit.xml");
    fs.writeFileSync(file, '<testsuite name="unit"><testcase name="a"/>');
    const res = await summarize({ inputs: [file], branch: "main", format: "markdown" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.code).toBe("INVALID_RECORD");
    expect(res.error.startsWith(`Invalid JUnit XML in ${file}: `)).toBe(true);
  });
});
