import path from "node:path";
import { parseJunitXmlFile } from "./junit-xml.js";
import { passthroughJson } from "./passthrough.js";
import type { AdapterOutput, SourceFormat } from "../types/adapter-output.js";
import type { RawTestResult } from "../types/test-result.js";

const ADAPTER_VERSION = "1.0.0";

export type InputSpec = {
  /** Branch the file's records belong to, when given as `branch=path`. */
  branch?: string;
  path: string;
};

/** Detect source format from file extension. */
function detectFormat(filePath: string): SourceFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".xml") return "junit_xml";
  if (ext === ".json") return "json";
  return null;
}

/**
 * Split a command-line input into branch and path: `develop=out/junit.xml`.
 * A plain path leaves the branch to the caller's default.
 */
export function parseInputSpec(raw: string): InputSpec {
  const trimmed = raw.trim();
  const eq = trimmed.indexOf("=");
  if (eq <= 0) return { path: trimmed };

  const branch = trimmed.slice(0, eq).trim();
  const filePath = trimmed.slice(eq + 1).trim();
  if (!filePath) {
    throw new Error(`Invalid input "${raw}". Expected format: [<branch>=]<path>`);
  }
  return { branch, path: filePath };
}

/**
 * Adapter entry point: routes to the parser for the file's format.
 *
 * @param opts.branch - Branch for records that do not name one.
 * @param opts.format - Explicit format override; detected from the extension otherwise.
 */
export async function adaptTestResults(
  filePath: string,
  opts: { branch?: string; format?: SourceFormat } = {},
): Promise<AdapterOutput> {
  const sourceFormat = opts.format ?? detectFormat(filePath);
  const branch = opts.branch ?? "";
  let records: RawTestResult[];

  switch (sourceFormat) {
    case "junit_xml":
      records = parseJunitXmlFile(filePath, branch);
      break;
    case "json":
      records = await passthroughJson(filePath, branch);
      break;
    default:
      throw new Error(`Unsupported adapter format for ${path.basename(filePath)} (expected .xml or .json)`);
  }

  return {
    adapter_version: ADAPTER_VERSION,
    source_format: sourceFormat,
    source_file: path.basename(filePath),
    converted_at: new Date().toISOString(),
    records,
  };
}
