/** Configuration types: layered config system. */
import type { LogLevel } from "../logger.js";
import type { OutputFormat } from "../render/summary.js";

export type ArtifactsConfig = {
  summary_file: string;
  build_log_file: string;
  build_success_message: string;
  build_log_tail_lines: number;
  file_encoding: BufferEncoding;
  /** minimatch globs of artifact paths to leave out. */
  ignore: string[];
  suites: string[];
  /** How many recent hashes per branch and machine to summarize. */
  history: number;
  /** Web URL of the artifacts repository, for links in the tables. */
  repo_url?: string;
};

export type SummariesConfig = {
  remote: string;
};

export type BranchsumConfig = {
  schema_version: string;
  machines: string[];
  log_level: LogLevel;
  output_format: OutputFormat;
  artifacts: ArtifactsConfig;
  summaries: SummariesConfig;
};
