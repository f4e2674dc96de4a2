import { conforms, loadAjv } from "../schema/ajv.js";
import { loadConfig } from "./loader.js";
import { LOG_LEVELS, canonicalLevelName } from "../logger.js";
import { OUTPUT_FORMATS } from "../render/summary.js";
import type { BranchsumConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "machines", "log_level", "output_format", "artifacts", "summaries"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    machines: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1, uniqueItems: true },
    log_level: { type: "string", enum: [...LOG_LEVELS] },
    output_format: { type: "string", enum: [...OUTPUT_FORMATS] },
    artifacts: {
      type: "object",
      required: [
        "summary_file",
        "build_log_file",
        "build_success_message",
        "build_log_tail_lines",
        "file_encoding",
        "ignore",
        "suites",
        "history",
      ],
      properties: {
        summary_file: { type: "string", minLength: 1 },
        build_log_file: { type: "string", minLength: 1 },
        build_success_message: { type: "string", minLength: 1 },
        build_log_tail_lines: { type: "integer", minimum: 1 },
        file_encoding: { type: "string", enum: ["utf8", "utf-8", "latin1", "ascii"] },
        ignore: { type: "array", items: { type: "string" } },
        suites: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
        history: { type: "integer", minimum: 1 },
        repo_url: { type: "string", format: "uri" },
      },
    },
    summaries: {
      type: "object",
      required: ["remote"],
      properties: {
        remote: { type: "string", minLength: 1 },
      },
    },
  },
};

export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigValidationResult =
  | { valid: true; config: BranchsumConfig; errors: null }
  | { valid: false; errors: string };

/** Level aliases such as `warning` are accepted from files and env vars, and stored canonical. */
function withCanonicalLogLevel(config: unknown): unknown {
  if (typeof config !== "object" || config === null || !("log_level" in config)) return config;
  const level = config.log_level;
  return typeof level === "string" ? { ...config, log_level: canonicalLevelName(level) } : config;
}

/** Validate a loaded config against the config schema. */
export async function validateConfig(loaded: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile(CONFIG_SCHEMA);
  const config = withCanonicalLogLevel(loaded);
  if (conforms<BranchsumConfig>(validate, config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Load the layered config and validate it; throws ConfigError when it does not conform. */
export async function resolveConfig(envName?: string, configDir?: string): Promise<BranchsumConfig> {
  const result = await validateConfig(loadConfig(envName, configDir));
  if (!result.valid) {
    throw new ConfigError(`Config invalid: ${result.errors}`);
  }
  return result.config;
}
