import fs from "node:fs";
import { createRegistry } from "../schema/registry.js";
import { InvalidRecordError } from "../summary/errors.js";
import type { RawTestResult } from "../types/test-result.js";

type JsonRecord = { branch?: string; test: string; status: string; duration: number };

/**
 * Passthrough adapter: reads a JSON array of `{ branch?, test, status, duration }`.
 * The shape is checked against the "test-results" schema; status and duration
 * values are left for the summary builder to judge.
 */
export async function passthroughJson(filePath: string, defaultBranch = ""): Promise<RawTestResult[]> {
  const raw = fs.readFileSync(filePath, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new InvalidRecordError(`Invalid test result JSON in ${filePath}: ${(e as Error).message}`, {
      source: filePath,
    });
  }

  const registry = await createRegistry();
  const check = await registry.check<JsonRecord[]>("test-results", data);
  if (!check.ok) {
    throw new InvalidRecordError(`Invalid test result JSON in ${filePath}: ${check.errors}`, { source: filePath });
  }

  return check.value.map((r) => ({
    branch: r.branch ?? defaultBranch,
    test: r.test,
    status: r.status,
    duration: r.duration,
  }));
}
