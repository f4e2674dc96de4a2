import { renderCsv, renderMarkdownTable, type Column } from "./table.js";
import type { ArtifactCommit, MatrixRow, SuiteCell } from "../types/artifacts.js";

export type MatrixFormat = "markdown" | "csv";

function cell(value: SuiteCell | undefined): string {
  return value === undefined ? "" : String(value);
}

export type MatrixOptions = {
  /** Web URL of the artifacts repository; commits render as links under `<url>/tree/<commit>`. */
  artifactsUrl?: string;
};

function artifactsCell(artifacts: ArtifactCommit, url: string | undefined): string {
  if (!artifacts.commit || !url) return artifacts.commit;
  return `[artifacts](${url.replace(/\/+$/, "")}/tree/${artifacts.commit})`;
}

/** Columns of the build matrix; one pass/fail pair per configured suite. */
export function matrixColumns(suites: readonly string[], opts: MatrixOptions = {}): Column<MatrixRow>[] {
  const columns: Column<MatrixRow>[] = [
    { header: "branch", value: (r) => r.combination.branch },
    { header: "host", value: (r) => r.combination.host },
    { header: "compiler", value: (r) => `${r.combination.compiler}/${r.combination.compilerVersion}` },
    { header: "mpi", value: (r) => `${r.combination.mpi}/${r.combination.mpiVersion}` },
    { header: "o_g", value: (r) => r.combination.optLevel },
    { header: "os", value: (r) => r.combination.os },
    { header: "build", value: (r) => (r.buildPassed ? "pass" : "fail") },
  ];
  for (const suite of suites) {
    columns.push(
      { header: `${suite}_pass`, align: "right", value: (r) => cell(r.suites[suite]?.pass) },
      { header: `${suite}_fail`, align: "right", value: (r) => cell(r.suites[suite]?.fail) },
    );
  }
  columns.push(
    { header: "hash", value: (r) => r.hash },
    { header: "artifacts", value: (r) => artifactsCell(r.artifacts, opts.artifactsUrl) },
    { header: "modified", value: (r) => r.artifacts.modified },
  );
  return columns;
}

export function renderMatrix(
  rows: readonly MatrixRow[],
  suites: readonly string[],
  format: MatrixFormat,
  opts: MatrixOptions = {},
): string {
  const columns = matrixColumns(suites, opts);
  return format === "csv" ? renderCsv(columns, rows) : renderMarkdownTable(columns, rows, { showIndex: true });
}
