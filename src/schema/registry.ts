import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type ValidationOutcome = { valid: true; errors: null } | { valid: false; errors: string };

/** Bundled schemas live next to `src/` and `dist/`. */
export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

/**
 * Discovers every `*.schema.json` in a directory and compiles validators on
 * first use.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort()) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "pipeline.schema.json" → "pipeline"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
    return this;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: string, data: unknown): ValidationOutcome {
    const validate = this.validator(name);
    if (validate(data)) return { valid: true, errors: null };
    return { valid: false, errors: this.ajv.errorsText(validate.errors, { separator: "; ", dataVar: name }) };
  }

  /** Type guard backed by the named schema. */
  guard<T>(name: string): (data: unknown) => data is T {
    const validate = this.validator(name);
    return (data: unknown): data is T => validate(data);
  }

  /** Error text of the last failed check through `guard(name)`. */
  lastErrors(name: string): string {
    return this.ajv.errorsText(this.validator(name).errors, { separator: "; ", dataVar: name });
  }
}

/** Pull "x.y.z" out of a `$id` such as ".../pipeline.schema.json@1.0.0". */
function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)/.exec(id);
  return m ? m[1] : null;
}

export function createRegistry(schemaDir: string = DEFAULT_SCHEMA_DIR): SchemaRegistry {
  return new SchemaRegistry(schemaDir).load();
}
