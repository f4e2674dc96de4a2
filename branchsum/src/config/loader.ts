import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "BRANCHSUM_";

type Layer = Record<string, unknown>;

function isLayer(value: unknown): value is Layer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isLayer(val) && isLayer(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isLayer(parsed)) {
    throw new Error(`Config file must hold a mapping: ${filePath}`);
  }
  return parsed;
}

/** BRANCHSUM_LOG_LEVEL=debug → { log_level: "debug" }. Only top-level scalar keys. */
function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv): Layer {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← BRANCHSUM_* variables.
 * The result is unchecked; see `resolveConfig` for the validated form.
 *
 * @param envName - Optional layer name, loaded from `{configDir}/{envName}.yaml`.
 * @param configDir - Directory holding the YAML files; defaults to the bundled `config/`.
 */
export function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Layer {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
