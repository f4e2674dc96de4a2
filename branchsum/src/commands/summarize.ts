import fs from "node:fs";
import path from "node:path";
import { adaptTestResults, parseInputSpec, type InputSpec } from "../adapter/adapter.js";
import { logger } from "../logger.js";
import { renderSummary, type OutputFormat } from "../render/summary.js";
import { buildBranchSummaries } from "../summary/builder.js";
import { isInvalidRecordError } from "../summary/errors.js";
import type { ErrorCode } from "./exit-codes.js";
import type { BranchSummary, RawTestResult } from "../types/test-result.js";

export type SummarizeOptions = {
  /** `path` or `branch=path` entries. */
  inputs: string[];
  /** Branch for inputs that name none. */
  branch?: string;
  format: OutputFormat;
  /** Write the rendered summary here instead of returning it only. */
  output?: string;
};

export type SummarizeResult =
  | {
      ok: true;
      summaries: BranchSummary[];
      rendered: string;
      outputPath?: string;
      /** Branches with at least one failing test. */
      failing: string[];
    }
  | { ok: false; code: ErrorCode; error: string };

function fail(code: ErrorCode, error: string): SummarizeResult {
  return { ok: false, code, error };
}

/** Read every input, aggregate per branch and render. */
export async function summarize(opts: SummarizeOptions): Promise<SummarizeResult> {
  if (opts.inputs.length === 0) {
    return fail("INVALID_ARGS", "No test result inputs given");
  }

  let specs: InputSpec[];
  try {
    specs = opts.inputs.map(parseInputSpec);
  } catch (e) {
    return fail("INVALID_ARGS", (e as Error).message);
  }

  const records: RawTestResult[] = [];
  const sources: string[] = [];
  for (const spec of specs) {
    const filePath = path.resolve(spec.path);
    if (!fs.existsSync(filePath)) {
      return fail("INPUT_UNREADABLE", `Test result file not found: ${spec.path}`);
    }
    try {
      const output = await adaptTestResults(filePath, { branch: spec.branch ?? opts.branch });
      logger.info(`read ${output.records.length} records from ${output.source_file}`, "summarize", {
        format: output.source_format,
      });
      records.push(...output.records);
      sources.push(...output.records.map(() => spec.path));
    } catch (e) {
      if (isInvalidRecordError(e)) return fail("INVALID_RECORD", e.message);
      return fail("INPUT_UNREADABLE", `Could not read ${spec.path}: ${(e as Error).message}`);
    }
  }

  let summaries: BranchSummary[];
  try {
    summaries = buildBranchSummaries(records);
  } catch (e) {
    if (isInvalidRecordError(e)) {
      const source = e.index === undefined ? undefined : sources[e.index];
      return fail("INVALID_RECORD", source ? `${e.message} (${source})` : e.message);
    }
    throw e;
  }

  const rendered = renderSummary(summaries, opts.format);
  let outputPath: string | undefined;
  if (opts.output) {
    outputPath = path.resolve(opts.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, rendered + "\n", "utf8");
    logger.info(`wrote ${opts.format} summary to ${outputPath}`, "summarize");
  }

  return {
    ok: true,
    summaries,
    rendered,
    outputPath,
    failing: summaries.filter((s) => s.counts.fail > 0).map((s) => s.branch),
  };
}
