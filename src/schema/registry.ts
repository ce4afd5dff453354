import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { compileCheck, loadAjv, type AjvInstance, type SchemaCheck } from "./ajv.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

/**
 * Schema registry: discovers the *.schema.json files in a directory and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private checks = new Map<string, SchemaCheck<unknown>>();

  private constructor(private readonly ajv: AjvInstance) {}

  static async load(schemaDir: string = SCHEMA_DIR): Promise<SchemaRegistry> {
    if (!fs.existsSync(schemaDir)) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }
    const registry = new SchemaRegistry(await loadAjv());

    for (const file of fs.readdirSync(schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "manifest-deps.schema.json" → "manifest-deps"
      const name = file.replace(/\.schema\.json$/, "");
      registry.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    return registry;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  private check(name: string): SchemaCheck<unknown> {
    const cached = this.checks.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    const check = compileCheck<unknown>(this.ajv, entry.schema);
    this.checks.set(name, check);
    return check;
  }

  /** Validate data against a named schema. */
  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const { valid, errors } = this.check(name)(data);
    return { valid, errors };
  }
}

/** Version from an explicit `version` field or an `$id` ending in `@x.y.z`. */
function extractVersion(schema: unknown): string | null {
  if (schema === null || typeof schema !== "object") return null;
  if ("version" in schema && typeof schema.version === "string") return schema.version;
  if ("$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}
