import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "../src/config/loader.js";
import { ConfigError, resolveConfig, validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

function tmpConfig(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "branchsum-config-"));
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content, "utf8");
  }
  return dir;
}

describe("config loader", () => {
  it("loads base config", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config.log_level).toBe("info");
    expect(config.machines).toHaveLength(12);
  });

  it("merges an env layer over base, keeping nested keys", () => {
    const config = loadConfig("ci", CONFIG_DIR, {});
    expect(config.log_level).toBe("warn");
    expect(config.output_format).toBe("csv");
    expect(config.artifacts).toMatchObject({ history: 5, summary_file: "summary.dat", build_log_tail_lines: 200 });
  });

  it("applies BRANCHSUM_ variables", () => {
    const config = loadConfig(undefined, CONFIG_DIR, { BRANCHSUM_LOG_LEVEL: "debug", OTHER_LOG_LEVEL: "error" });
    expect(config.log_level).toBe("debug");
  });

  it("ignores a missing env layer", () => {
    expect(loadConfig("nope", CONFIG_DIR, {})).toEqual(loadConfig(undefined, CONFIG_DIR, {}));
  });

  it("rejects a file that is not a mapping", () => {
    const dir = tmpConfig({ "base.yaml": "- one\n- two\n" });
    expect(() => loadConfig(undefined, dir, {})).toThrow(`Config file must hold a mapping: ${path.join(dir, "base.yaml")}`);
  });
});

describe("config validator", () => {
  it("accepts the bundled config", async () => {
    const result = await validateConfig(loadConfig(undefined, CONFIG_DIR, {}));
    expect(result.valid).toBe(true);
    expect(result.errors).toBeNull();
  });

  it("accepts every bundled layer", async () => {
    expect((await validateConfig(loadConfig("ci", CONFIG_DIR, {}))).valid).toBe(true);
  });

  it("rejects an unknown output format", async () => {
    const config = { ...loadConfig(undefined, CONFIG_DIR, {}), output_format: "html" };
    const result = await validateConfig(config);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/output_format must be equal to one of the allowed values");
  });

  it("rejects a non-positive history", async () => {
    const base = await resolveConfig(undefined, CONFIG_DIR);
    const result = await validateConfig({ ...base, artifacts: { ...base.artifacts, history: 0 } });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/artifacts/history must be >= 1");
  });

  it("throws ConfigError from resolveConfig", async () => {
    const dir = tmpConfig({ "base.yaml": "schema_version: '1.0.0'\n" });
    await expect(resolveConfig(undefined, dir)).rejects.toBeInstanceOf(ConfigError);
    await expect(resolveConfig(undefined, dir)).rejects.toThrow(/^Config invalid: data must have required property 'machines'/);
  });

  it("maps log level aliases from env vars to level names", async () => {
    const result = await validateConfig(loadConfig(undefined, CONFIG_DIR, { BRANCHSUM_LOG_LEVEL: "WARNING" }));
    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.config.log_level).toBe("warn");
  });

  it("maps log level aliases from config files", async () => {
    const base = fs.readFileSync(path.join(CONFIG_DIR, "base.yaml"), "utf8");
    const dir = tmpConfig({ "base.yaml": base, "quiet.yaml": "log_level: critical\n" });
    const config = await resolveConfig("quiet", dir);
    expect(config.log_level).toBe("error");
  });

  it("still rejects unknown log levels", async () => {
    const result = await validateConfig(loadConfig(undefined, CONFIG_DIR, { BRANCHSUM_LOG_LEVEL: "loud" }));
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/log_level must be equal to one of the allowed values");
  });

  it("checks the artifacts repository URL", async () => {
    const base = await resolveConfig(undefined, CONFIG_DIR);
    const url = "https://example.test/artifacts";
    expect((await validateConfig({ ...base, artifacts: { ...base.artifacts, repo_url: url } })).valid).toBe(true);
    const result = await validateConfig({ ...base, artifacts: { ...base.artifacts, repo_url: "not a url" } });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('/artifacts/repo_url must match format "uri"');
  });

  it("resolves the bundled config", async () => {
    const config = await resolveConfig("ci", CONFIG_DIR);
    expect(config.artifacts.suites).toEqual(["unit", "system", "example", "nuopc"]);
    expect(config.summaries.remote).toBe("origin");
  });
});
