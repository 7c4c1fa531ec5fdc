import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { CONFIG_DIR_NAME, packageRoot } from "../paths.js";
import type { TestsmithConfig } from "../types/config.js";

export type RawConfig = Record<string, unknown>;

export const ENV_PREFIX = "TESTSMITH_";

/** Separates nested keys in variable names: `TESTSMITH_FRAMEWORKS__GTEST__ENABLED`. */
const ENV_PATH_SEPARATOR = "__";

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file, or an empty object when it does not exist. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new Error(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

/** `"42"` → 42, `"true"` → true; anything else stays a string. */
export function coerceEnvValue(value: string): string | number | boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value.trim() !== "" && /^-?\d+(\.\d+)?$/.test(value.trim())) return Number(value);
  return value;
}

/** Apply TESTSMITH_ prefixed variables on top of `config`. */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // TESTSMITH_LOG_LEVEL → log_level
    const keyPath = key.slice(ENV_PREFIX.length).toLowerCase().split(ENV_PATH_SEPARATOR);
    const override: RawConfig = {};
    let cursor = override;
    keyPath.forEach((segment, i) => {
      if (i === keyPath.length - 1) {
        cursor[segment] = coerceEnvValue(value);
      } else {
        const next: RawConfig = {};
        cursor[segment] = next;
        cursor = next;
      }
    });
    result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <envName>.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const dir = configDir ?? path.join(packageRoot(), CONFIG_DIR_NAME);

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  return applyEnvOverrides(merged, env);
}

/** Framework override first, then the global value, in milliseconds. */
export function resolveTimeoutMs(config: TestsmithConfig, framework: string): number {
  const seconds = config.frameworks?.[framework]?.timeout_seconds ?? config.timeout_seconds;
  return seconds * 1000;
}

export function isFrameworkEnabled(config: TestsmithConfig, framework: string): boolean {
  return config.frameworks?.[framework]?.enabled ?? true;
}
