import fs from "node:fs";
import path from "node:path";
import { adaptTestResults, parseInputSpec, type InputSpec } from "../adapter/adapter.js";
import { validateConfig } from "../config/validator.js";
import { loadConfig } from "../config/loader.js";
import { createRegistry } from "../schema/registry.js";
import { buildBranchSummaries } from "../summary/builder.js";
import { isInvalidRecordError } from "../summary/errors.js";
import { computeSha256FromContent } from "../writer/checksum.js";
import type { WrittenFilesReport } from "../writer/writer.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult = { ok: true; records: number } | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Check a written-files report against its schema and the files on disk. */
async function validateReport(reportPath: string, outputDir: string): Promise<Diagnostic[]> {
  if (!fs.existsSync(reportPath)) {
    return [diag("error", "REPORT_MISSING", `Report not found: ${reportPath}`, { path: reportPath })];
  }

  let report: unknown;
  try {
    report = JSON.parse(fs.readFileSync(reportPath, "utf8"));
  } catch (e) {
    return [diag("error", "REPORT_INVALID", `Report is not valid JSON: ${(e as Error).message}`, { path: reportPath })];
  }

  const registry = await createRegistry();
  const check = await registry.check<WrittenFilesReport>("written-files", report);
  if (!check.ok) {
    return [diag("error", "REPORT_INVALID", `Report invalid: ${check.errors}`, { path: reportPath })];
  }

  const errors: Diagnostic[] = [];
  for (const file of check.value.files) {
    const fullPath = path.resolve(outputDir, file.path);
    if (!fs.existsSync(fullPath)) {
      errors.push(diag("error", "FILE_MISSING", `Reported file not found: ${file.path}`, { path: file.path }));
      continue;
    }
    const actual = computeSha256FromContent(fs.readFileSync(fullPath));
    if (actual !== file.sha256) {
      errors.push(
        diag("error", "CHECKSUM_MISMATCH", `Checksum mismatch for ${file.path}`, {
          path: file.path,
          details: { expected: file.sha256, actual },
        }),
      );
    }
  }
  return errors;
}

/**
 * Check the layered config and, optionally, test-result inputs without
 * rendering anything. Every problem is collected rather than stopping at
 * the first; within one input the first invalid record is reported.
 * A written-files report is checked against the files under `outputDir`
 * (by default the report's own directory).
 */
export async function validateAll(opts: {
  configDir?: string;
  env?: string;
  inputs?: string[];
  branch?: string;
  report?: string;
  outputDir?: string;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  let records = 0;

  if (opts.configDir && !fs.existsSync(opts.configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${opts.configDir}`)] };
  }

  try {
    const result = await validateConfig(loadConfig(opts.env, opts.configDir));
    if (!result.valid) {
      errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${result.errors}`, { path: opts.configDir }));
    }
  } catch (e) {
    errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${(e as Error).message}`, { path: opts.configDir }));
  }

  for (const raw of opts.inputs ?? []) {
    let spec: InputSpec;
    try {
      spec = parseInputSpec(raw);
    } catch (e) {
      errors.push(diag("error", "INPUT_SPEC_INVALID", (e as Error).message));
      continue;
    }

    const filePath = path.resolve(spec.path);
    if (!fs.existsSync(filePath)) {
      errors.push(diag("error", "INPUT_MISSING", `Test result file not found: ${spec.path}`, { path: spec.path }));
      continue;
    }

    try {
      const output = await adaptTestResults(filePath, { branch: spec.branch ?? opts.branch });
      buildBranchSummaries(output.records);
      records += output.records.length;
    } catch (e) {
      if (isInvalidRecordError(e)) {
        errors.push(
          diag("error", e.code, `${spec.path}: ${e.message}`, {
            path: spec.path,
            details: e.index === undefined ? undefined : { index: e.index, field: e.field },
          }),
        );
      } else {
        errors.push(diag("error", "INPUT_UNREADABLE", `${spec.path}: ${(e as Error).message}`, { path: spec.path }));
      }
    }
  }

  if (opts.report) {
    const reportPath = path.resolve(opts.report);
    errors.push(...(await validateReport(reportPath, path.resolve(opts.outputDir ?? path.dirname(reportPath)))));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, records };
}
