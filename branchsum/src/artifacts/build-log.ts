import path from "node:path";
import type { JobAttributes } from "../types/artifacts.js";

/**
 * True when `successMessage` appears within the last `tailLines` lines of a
 * build log. Builds print the message at the very end, so older lines are
 * not searched.
 */
export function isBuildPassing(content: string, successMessage: string, tailLines: number): boolean {
  const lines = content.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.slice(-tailLines).some((l) => l.includes(successMessage));
}

/**
 * Job attributes from an artifact path laid out as
 * `<branch>/<host>/<compiler>/<c_version>/<o_g>/<mpi>/<m_version>/<dir>/<file>`.
 * Segments are lowercased and stripped of "out".
 */
export function jobAttributesFromPath(filePath: string): JobAttributes | null {
  const segments = path.normalize(filePath).split(/[\\/]+/).filter(Boolean);
  if (segments.length < 9) return null;

  const [branch, host, compiler, compilerVersion, optLevel, mpi, mpiVersion] = segments
    .slice(-9, -2)
    .map((s) => s.toLowerCase().replace(/out/g, ""));
  return { branch, host, compiler, compilerVersion, optLevel, mpi, mpiVersion };
}
