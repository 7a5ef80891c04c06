import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { CollectedFile } from "../types/job.js";

/** SHA-256 of a file's content, hex encoded. */
export function computeSha256(filePath: string): string {
  return createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}

/**
 * Every regular file below `root`, with POSIX paths relative to `root`,
 * sorted by path.
 */
export function digestTree(root: string): CollectedFile[] {
  const files: CollectedFile[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile()) {
        files.push({
          path: path.relative(root, full).split(path.sep).join("/"),
          sha256: computeSha256(full),
          bytes: fs.statSync(full).size,
        });
      }
    }
  };
  if (fs.existsSync(root)) walk(root);
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
