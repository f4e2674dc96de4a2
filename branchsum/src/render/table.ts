export type Column<T> = {
  header: string;
  align?: "left" | "right";
  value: (row: T) => string;
};

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function line(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/**
 * GitHub-flavoured pipe table. With `showIndex` a leading `#` column numbers
 * the rows from 0.
 */
export function renderMarkdownTable<T>(
  columns: Column<T>[],
  rows: readonly T[],
  opts: { showIndex?: boolean } = {},
): string {
  const cols: Column<{ row: T; index: number }>[] = columns.map((c) => ({
    header: c.header,
    align: c.align,
    value: ({ row }) => c.value(row),
  }));
  if (opts.showIndex) {
    cols.unshift({ header: "#", align: "right", value: ({ index }) => String(index) });
  }

  const lines = [
    line(cols.map((c) => escapeCell(c.header))),
    line(cols.map((c) => (c.align === "right" ? "---:" : "---"))),
  ];
  rows.forEach((row, index) => {
    lines.push(line(cols.map((c) => escapeCell(c.value({ row, index })))));
  });
  return lines.join("\n");
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderCsv<T>(columns: Column<T>[], rows: readonly T[]): string {
  const lines = [columns.map((c) => csvField(c.header)).join(",")];
  for (const row of rows) {
    lines.push(columns.map((c) => csvField(c.value(row))).join(","));
  }
  return lines.join("\n");
}
