import { loadConfig, type RawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import type { TestsmithConfig } from "../types/config.js";

export type ShowConfigResult =
  | { ok: true; config: TestsmithConfig }
  | { ok: false; error: string; raw: RawConfig | null };

/** Merged configuration for an environment, validated. */
export async function showConfig(opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv }): Promise<ShowConfigResult> {
  let raw: RawConfig;
  try {
    raw = loadConfig(opts.envName, opts.configDir, opts.env);
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e), raw: null };
  }
  const checked = await validateConfig(raw);
  if (!checked.valid) return { ok: false, error: checked.errors, raw };
  return { ok: true, config: checked.config };
}
