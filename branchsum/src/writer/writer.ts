import fs from "node:fs";
import path from "node:path";
import { computeSha256FromContent } from "./checksum.js";

export type WrittenFile = {
  /** Path relative to the writer's root directory. */
  path: string;
  sha256: string;
  bytes: number;
};

export type WrittenFilesReport = {
  generated_at: string;
  files: WrittenFile[];
};

/**
 * Summary Writer: writes rendered summaries under a root directory and keeps
 * track of what it wrote, so the command can report it.
 */
export class SummaryWriter {
  private written: WrittenFile[] = [];
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  /** Write `content` (plus a trailing newline) to `relativePath`, creating directories. */
  write(relativePath: string, content: string): string {
    const fullPath = path.resolve(this.rootDir, relativePath);
    const rel = path.relative(this.rootDir, fullPath);
    if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new Error(`Refusing to write outside ${this.rootDir}: ${relativePath}`);
    }

    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    const data = content.endsWith("\n") ? content : content + "\n";
    fs.writeFileSync(fullPath, data, "utf8");

    const posixRel = rel.split(path.sep).join("/");
    this.written = this.written.filter((f) => f.path !== posixRel);
    this.written.push({
      path: posixRel,
      sha256: computeSha256FromContent(data),
      bytes: Buffer.byteLength(data, "utf8"),
    });
    return fullPath;
  }

  getWritten(): WrittenFile[] {
    return [...this.written];
  }

  report(): WrittenFilesReport {
    return { generated_at: new Date().toISOString(), files: this.getWritten() };
  }
}
