import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";

export type FindOptions = {
  /** Exact base name to look for, e.g. "summary.dat". */
  fileName: string;
  /** Substrings that must all appear in the file's path. */
  pathIncludes?: string[];
  /** The file must contain at least one of these; ignored when empty. */
  contentIncludes?: string[];
  /** minimatch globs, matched against the path relative to the root. */
  ignore?: string[];
  encoding?: BufferEncoding;
};

function* walk(dir: string): Generator<string> {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === ".git") continue;
      yield* walk(full);
    } else if (entry.isFile()) {
      yield full;
    }
  }
}

/**
 * Find artifact files under `root` by name, path and content.
 * Returns absolute paths in sorted order.
 */
export function findArtifactFiles(root: string, opts: FindOptions): string[] {
  const rootDir = path.resolve(root);
  if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
    throw new Error(`${root} is invalid`);
  }

  const pathIncludes = opts.pathIncludes ?? [];
  const contentIncludes = opts.contentIncludes ?? [];
  const ignore = opts.ignore ?? [];

  const results: string[] = [];
  for (const file of walk(rootDir)) {
    if (path.basename(file) !== opts.fileName) continue;

    const rel = path.relative(rootDir, file).split(path.sep).join("/");
    if (!pathIncludes.every((s) => rel.includes(s))) continue;
    if (ignore.some((pattern) => minimatch(rel, pattern, { dot: true }))) continue;

    if (contentIncludes.length > 0) {
      const content = fs.readFileSync(file, opts.encoding ?? "utf8");
      if (!contentIncludes.some((s) => content.includes(s))) continue;
    }
    results.push(file);
  }

  return results.sort();
}
