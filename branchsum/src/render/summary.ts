import { renderCsv, renderMarkdownTable, type Column } from "./table.js";
import { totalsOf } from "../summary/builder.js";
import type { BranchSummary } from "../types/test-result.js";

export const OUTPUT_FORMATS = ["markdown", "csv", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

const SUMMARY_COLUMNS: Column<BranchSummary>[] = [
  { header: "branch", value: (s) => s.branch },
  { header: "pass", align: "right", value: (s) => String(s.counts.pass) },
  { header: "fail", align: "right", value: (s) => String(s.counts.fail) },
  { header: "skip", align: "right", value: (s) => String(s.counts.skip) },
  { header: "total", align: "right", value: (s) => String(s.total) },
  { header: "duration (s)", align: "right", value: (s) => s.duration.toFixed(3) },
];

function renderMarkdown(summaries: readonly BranchSummary[]): string {
  const table = renderMarkdownTable(SUMMARY_COLUMNS, summaries);
  if (summaries.length === 0) return table;

  const t = totalsOf(summaries);
  const footer =
    `**Total:** ${t.total} test${t.total === 1 ? "" : "s"} on ${t.branches} branch${t.branches === 1 ? "" : "es"}` +
    ` (${t.counts.pass} passed, ${t.counts.fail} failed, ${t.counts.skip} skipped) in ${t.duration.toFixed(3)}s`;
  return `${table}\n\n${footer}`;
}

/** Render branch summaries; the result has no trailing newline. */
export function renderSummary(summaries: readonly BranchSummary[], format: OutputFormat): string {
  switch (format) {
    case "markdown":
      return renderMarkdown(summaries);
    case "csv":
      return renderCsv(SUMMARY_COLUMNS, summaries);
    case "json":
      return JSON.stringify(summaries, null, 2);
  }
}
