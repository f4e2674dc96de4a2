#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { runArtifactsJob } from "./commands/artifacts.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { summarize } from "./commands/summarize.js";
import { validateAll } from "./commands/validate.js";
import { resolveConfig } from "./config/validator.js";
import { GitOperations } from "./git/operations.js";
import { configureLogger, logger, parseLogLevel } from "./logger.js";
import { isOutputFormat } from "./render/summary.js";
import type { BranchsumConfig } from "./types/config.js";

type Format = "human" | "jsonl";

type CommonOpts = { config?: string; env?: string; log?: string; format: Format };

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || String(n) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function outputMode(value: string): Format {
  if (value !== "human" && value !== "jsonl") {
    throw new InvalidArgumentError("Expected human or jsonl.");
  }
  return value;
}

function emitError(format: Format, code: string, message: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code, message }) + "\n");
  } else {
    console.error(message);
  }
}

/** Load config and point the logger at the requested level; exits on bad input. */
async function setup(opts: CommonOpts): Promise<BranchsumConfig> {
  let config: BranchsumConfig;
  try {
    config = await resolveConfig(opts.env, opts.config);
  } catch (e) {
    emitError(opts.format, "CONFIG_INVALID", (e as Error).message);
    process.exit(EXIT.FAILED);
  }

  try {
    configureLogger({ level: parseLogLevel(opts.log ?? config.log_level), format: opts.format });
  } catch (e) {
    emitError(opts.format, "INVALID_ARGS", (e as Error).message);
    process.exit(EXIT.INVALID_ARGS);
  }
  return config;
}

const program = new Command();

program
  .name("branchsum")
  .description("Summarize per-branch test results into Markdown, CSV or JSON")
  .version("0.1.0");

program
  .command("summarize")
  .description("Aggregate test results per branch")
  .argument("<inputs...>", "Test result files (.json or JUnit .xml), optionally as <branch>=<path>")
  .option("-b, --branch <name>", "Branch for inputs that do not name one")
  .option("-o, --output <path>", "Write the summary to a file")
  .option("--summary-format <format>", "Summary format: markdown|csv|json (default: from config)")
  .option("--fail-on-failure", "Exit with a non-zero code when any branch has failing tests")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("-l, --log <level>", "Logging level: debug|info|warn|error (default: from config)")
  .option("--format <format>", "Output format: human|jsonl", outputMode, "human")
  .action(
    async (
      inputs: string[],
      opts: CommonOpts & { branch?: string; output?: string; summaryFormat?: string; failOnFailure?: boolean },
    ) => {
      const config = await setup(opts);
      const summaryFormat = opts.summaryFormat ?? config.output_format;
      if (!isOutputFormat(summaryFormat)) {
        emitError(opts.format, "INVALID_ARGS", `Unknown summary format: ${summaryFormat}`);
        process.exit(EXIT.INVALID_ARGS);
      }

      const res = await summarize({ inputs, branch: opts.branch, format: summaryFormat, output: opts.output });
      if (!res.ok) {
        emitError(opts.format, res.code, res.error);
        process.exit(exitCodeFor(res.code));
      }

      if (opts.format === "jsonl") {
        const line = { level: "info", code: "OK", branches: res.summaries.length, failing: res.failing };
        process.stdout.write(
          JSON.stringify(res.outputPath ? { ...line, output: res.outputPath } : { ...line, summary: res.rendered }) + "\n",
        );
      } else if (res.outputPath) {
        console.log(`Wrote ${summaryFormat} summary for ${res.summaries.length} branch(es) to ${res.outputPath}`);
      } else {
        process.stdout.write(res.rendered + "\n");
      }

      if (opts.failOnFailure && res.failing.length > 0) {
        emitError(opts.format, "TESTS_FAILED", `Failing tests on: ${res.failing.join(", ")}`);
        process.exit(EXIT.TESTS_FAILED);
      }
    },
  );

program
  .command("artifacts")
  .description("Summarize a test-artifacts repository into build-matrix tables per branch and hash")
  .argument("<repo_path>", "Path to the test-artifacts checkout")
  .option("-m, --machines <names...>", "Machines to summarize (default: all configured)")
  .option("-b, --branches <names...>", "Branches to summarize (default: discovered from the git log)")
  .option("-n, --number <n>", "Number of recent hashes per branch (default: from config)", positiveInt)
  .option("--output-dir <path>", "Directory (summaries repository) to write tables into", "summaries")
  .option("--push", "Commit and push the output directory")
  .option("--report <path>", "Write the list of written files (with sha256) as JSON")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("-l, --log <level>", "Logging level: debug|info|warn|error (default: from config)")
  .option("--format <format>", "Output format: human|jsonl", outputMode, "human")
  .action(
    async (
      repoPath: string,
      opts: CommonOpts & {
        machines?: string[];
        branches?: string[];
        number?: number;
        outputDir: string;
        push?: boolean;
        report?: string;
      },
    ) => {
      const config = await setup(opts);
      const machines = opts.machines ?? config.machines;
      const unknown = machines.filter((m) => !config.machines.includes(m));
      if (unknown.length > 0) {
        emitError(opts.format, "INVALID_ARGS", `Unknown machine(s): ${unknown.join(", ")} (choose from ${config.machines.join(", ")})`);
        process.exit(EXIT.INVALID_ARGS);
      }

      const started = Date.now();
      const res = await runArtifactsJob(
        {
          machines,
          branches: opts.branches,
          history: opts.number ?? config.artifacts.history,
          outputDir: opts.outputDir,
          push: opts.push,
          remote: config.summaries.remote,
          config: config.artifacts,
        },
        {
          artifacts: new GitOperations(path.resolve(repoPath)),
          summaries: opts.push ? new GitOperations(path.resolve(opts.outputDir)) : undefined,
        },
      );

      if (!res.ok) {
        emitError(opts.format, res.code, res.error);
        process.exit(exitCodeFor(res.code));
      }

      logger.info(`finished in ${((Date.now() - started) / 1000).toFixed(1)}s`, "artifacts", {
        rows: res.rows,
        skipped: res.skipped.length,
      });
      if (opts.report) {
        const reportPath = path.resolve(opts.report);
        fs.mkdirSync(path.dirname(reportPath), { recursive: true });
        fs.writeFileSync(reportPath, JSON.stringify(res.report, null, 2) + "\n", "utf8");
      }

      const files = res.report.files;
      if (opts.format === "jsonl") {
        for (const f of files) process.stdout.write(JSON.stringify(f) + "\n");
      } else if (files.length === 0) {
        console.log("No summaries written.");
      } else {
        for (const f of files) console.log(`${f.path}  ${f.bytes} bytes`);
      }
    },
  );

program
  .command("validate-config")
  .alias("validate")
  .description("Validate config and, optionally, test result inputs and a written-files report")
  .argument("[inputs...]", "Test result files to check, optionally as <branch>=<path>")
  .option("-b, --branch <name>", "Branch for inputs that do not name one")
  .option("--report <path>", "Written-files report to verify")
  .option("--output-dir <path>", "Directory the report's paths are relative to (default: the report's directory)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", outputMode, "human")
  .action(async (inputs: string[], opts: Omit<CommonOpts, "log"> & { branch?: string; report?: string; outputDir?: string }) => {
    const res = await validateAll({
      configDir: opts.config,
      env: opts.env,
      inputs,
      branch: opts.branch,
      report: opts.report,
      outputDir: opts.outputDir,
    });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) {
          process.stdout.write(JSON.stringify(err) + "\n");
        }
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(res.errors.some((e) => e.code === "INVALID_RECORD") ? EXIT.INVALID_RECORD : EXIT.FAILED);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", records: res.records }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
