import { cp, mkdir, readdir } from "node:fs/promises";
import path from "node:path";

function isWithin(child: string, parent: string): boolean {
  return child === parent || child.startsWith(parent + path.sep);
}

/**
 * Copy the working tree at `source` into a job's private workspace at `dest`.
 * `exclude` paths (and `dest` itself, which usually lives under `source`)
 * are left out.
 */
export async function seedWorkspace(source: string, dest: string, exclude: readonly string[] = []): Promise<void> {
  const target = path.resolve(dest);
  const skip = [target, ...exclude.map((p) => path.resolve(p))];
  await copyTree(path.resolve(source), target, skip);
}

async function copyTree(src: string, dest: string, skip: readonly string[]): Promise<void> {
  await mkdir(dest, { recursive: true });
  for (const entry of await readdir(src, { withFileTypes: true })) {
    const from = path.join(src, entry.name);
    if (skip.some((x) => isWithin(from, x))) continue;

    const to = path.join(dest, entry.name);
    // fs.cp refuses to copy a directory into itself, so walk into any
    // directory that holds a skipped path instead of copying it whole.
    if (entry.isDirectory() && skip.some((x) => isWithin(x, from))) {
      await copyTree(from, to, skip);
    } else {
      await cp(from, to, { recursive: true });
    }
  }
}
