import { createHash } from "node:crypto";
import { compareCombinations } from "./matrix.js";
import type { BuildCombination, MatrixRow } from "../types/artifacts.js";

/** Stable id of a combination within a hash; equal ids replace each other. */
export function rowId(combination: BuildCombination, hash: string): string {
  const c = combination;
  return createHash("sha256")
    .update([c.branch, c.host, c.os, c.compiler, c.compilerVersion, c.mpi, c.mpiVersion.toLowerCase(), c.optLevel, hash].join("\u0000"))
    .digest("hex");
}

/**
 * Matrix rows collected during one run, grouped into tables. A table holds
 * one branch at one hash, across every machine that tested it.
 */
export class SummaryArchive {
  private readonly tables = new Map<string, Map<string, MatrixRow>>();

  /** Add rows to a table; returns how many rows the table now holds. */
  add(table: string, rows: readonly MatrixRow[]): number {
    let byId = this.tables.get(table);
    if (!byId) {
      byId = new Map();
      this.tables.set(table, byId);
    }
    for (const row of rows) {
      byId.set(rowId(row.combination, row.hash), row);
    }
    return byId.size;
  }

  rowsFor(table: string): MatrixRow[] {
    const byId = this.tables.get(table);
    if (!byId) return [];
    return [...byId.values()].sort((a, b) => compareCombinations(a.combination, b.combination));
  }

  get size(): number {
    let n = 0;
    for (const byId of this.tables.values()) n += byId.size;
    return n;
  }
}
