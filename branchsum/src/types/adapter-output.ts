/** Adapter output: records read from one test-result file, before validation. */
import type { RawTestResult } from "./test-result.js";

export type SourceFormat = "junit_xml" | "json";

export type AdapterOutput = {
  adapter_version: string;
  source_format: SourceFormat;
  source_file: string;
  converted_at: string;
  records: RawTestResult[];
};
