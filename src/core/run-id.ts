import crypto from "node:crypto";

/**
 * Generate a run ID.
 * Format: {YYYYMMDD}t{HHMMSSmmm}-{hex6}, lowercase so it can name a kind cluster.
 */
export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[-:]/g, "").replace(".", "").replace("Z", "").toLowerCase();
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

/** Filesystem- and DNS-safe form of a job id or label. */
export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
  return slug.length > 0 ? slug.slice(0, 80) : "job";
}

/** Distinct directory names for a set of job ids, in order; clashes get -2, -3, ... */
export function uniqueSlugs(ids: readonly string[]): Map<string, string> {
  const taken = new Set<string>();
  const out = new Map<string, string>();
  for (const id of ids) {
    const base = slugify(id);
    let slug = base;
    for (let n = 2; taken.has(slug); n++) slug = `${base}-${n}`;
    taken.add(slug);
    out.set(id, slug);
  }
  return out;
}
