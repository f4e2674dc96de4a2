import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { conforms, loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/** Schemas bundled under `schemas/`. */
export type SchemaName = "test-results" | "written-files";

export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; errors: string };

/**
 * Loads every `*.schema.json` under a directory and compiles validators on
 * first use. "test-results.schema.json" registers as "test-results".
 */
export class SchemaRegistry {
  private schemas = new Map<string, unknown>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();
    for (const file of files) {
      const schema: unknown = JSON.parse(fs.readFileSync(path.join(this.schemaDir, file), "utf8"));
      this.schemas.set(file.replace(/\.schema\.json$/, ""), schema);
    }

    this.ajv = await loadAjv();
  }

  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.instance();
    const validate = ajv.compile(schema);
    this.validators.set(name, validate);
    return validate;
  }

  /**
   * Check `data` against a schema and hand it back typed as `T`. The schema
   * is the contract for `T`; keep the two in step.
   */
  async check<T>(name: SchemaName, data: unknown): Promise<SchemaCheck<T>> {
    const validate = await this.getValidator(name);
    if (conforms<T>(validate, data)) {
      return { ok: true, value: data };
    }
    const ajv = await this.instance();
    return { ok: false, errors: ajv.errorsText(validate.errors) };
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }
}

let shared: Promise<SchemaRegistry> | null = null;

/** Create and load a registry; without a directory the bundled schemas are shared. */
export function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  if (schemaDir) {
    const registry = new SchemaRegistry(schemaDir);
    return registry.load().then(() => registry);
  }
  if (!shared) {
    const registry = new SchemaRegistry(DEFAULT_SCHEMA_DIR);
    shared = registry.load().then(() => registry);
  }
  return shared;
}
