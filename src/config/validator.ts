import { LOG_LEVELS } from "../logging/logger.js";
import { loadAjv } from "../schema/ajv.js";
import type { TestsmithConfig } from "../types/config.js";

const FRAMEWORK_SCHEMA = {
  type: "object",
  properties: {
    enabled: { type: "boolean" },
    timeout_seconds: { type: "number", exclusiveMinimum: 0 },
  },
  additionalProperties: false,
};

/** Ensures required fields exist and known fields have the right shape. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "log_level", "timeout_seconds"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    log_level: { type: "string", enum: [...LOG_LEVELS] },
    timeout_seconds: { type: "number", exclusiveMinimum: 0 },
    collect_coverage: { type: "boolean" },
    max_scan_files: { type: "integer", minimum: 1 },
    frameworks: { type: "object", additionalProperties: FRAMEWORK_SCHEMA },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: TestsmithConfig; errors: null }
  | { valid: false; config: null; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<TestsmithConfig>(CONFIG_SCHEMA);
  if (validate(config)) return { valid: true, config, errors: null };
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors) };
}
