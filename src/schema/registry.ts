import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ClassificationReport } from "../types/report.js";
import type { PushSnapshotFile } from "../types/snapshot.js";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/** Bundled schemas and the types their documents decode to. */
export type SchemaTypes = {
  "push-snapshot": PushSnapshotFile;
  "classification-report": ClassificationReport;
};

export type SchemaName = keyof SchemaTypes;

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaValidation = { valid: boolean; errors: string | null };

/**
 * Schema registry. Discovers `*.schema.json` files and compiles validators on demand.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly validators = new Map<string, AjvValidateFn>();

  private constructor(
    private readonly ajv: AjvInstance,
    readonly schemaDir: string,
  ) {}

  static async create(schemaDir: string = SCHEMA_DIR): Promise<SchemaRegistry> {
    if (!fs.existsSync(schemaDir)) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }
    const registry = new SchemaRegistry(await loadAjv(), schemaDir);

    for (const file of fs.readdirSync(schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "push-snapshot.schema.json" → "push-snapshot"
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

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  validate(name: SchemaName, data: unknown): SchemaValidation {
    const validate = this.validator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors) };
  }

  /** Type guard form of `validate` for documents decoded from JSON. */
  conforms<N extends SchemaName>(name: N, data: unknown): data is SchemaTypes[N] {
    return this.validator(name)(data);
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const compiled = this.ajv.compile(entry.schema);
    this.validators.set(name, compiled);
    return compiled;
  }
}

/** Version from an explicit `version` field, or an `@x.y.z` suffix on `$id`. */
function extractVersion(schema: unknown): string | null {
  if (schema === null || typeof schema !== "object") return null;
  const version: unknown = Reflect.get(schema, "version");
  if (typeof version === "string") return version;

  const id: unknown = Reflect.get(schema, "$id");
  if (typeof id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(id);
    if (m) return m[1] ?? null;
  }
  return null;
}

let shared: Promise<SchemaRegistry> | null = null;

/** Registry over the bundled `schemas/` directory, loaded once per process. */
export function defaultRegistry(): Promise<SchemaRegistry> {
  shared ??= SchemaRegistry.create();
  return shared;
}
