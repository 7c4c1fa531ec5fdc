import fs from "node:fs";
import path from "node:path";
import { packageRoot, SCHEMA_DIR_NAME } from "../paths.js";
import { loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: object;
};

export type SchemaCheck = { valid: true; errors: null } | { valid: false; errors: string };

/**
 * Loads every `*.schema.json` in a directory and compiles validators on
 * first use.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs
      .readdirSync(this.schemaDir)
      .filter((f) => f.endsWith(".schema.json"))
      .sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
        throw new Error(`Schema is not an object: ${filePath}`);
      }
      // "run-result.schema.json" → "run-result"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  async validate(name: string, data: unknown): Promise<SchemaCheck> {
    const ajv = await this.instance();
    const validate = this.validatorFor(name, ajv);
    if (validate(data)) return { valid: true, errors: null };
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }

  private async instance(): Promise<AjvInstance> {
    this.ajv ??= await loadAjv();
    return this.ajv;
  }

  private validatorFor(name: string, ajv: AjvInstance): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }
}

/** `version` field, else a `@x.y.z` suffix on `$id`. */
function extractVersion(schema: object): string | null {
  if ("version" in schema && typeof schema.version === "string") return schema.version;
  if ("$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? path.join(packageRoot(), SCHEMA_DIR_NAME));
  await registry.load();
  return registry;
}
