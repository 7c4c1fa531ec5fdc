import { createDefaultRegistry, type AdapterRegistry } from "../adapters/registry.js";
import type { AdapterOptions } from "../adapters/base.js";
import { isFrameworkEnabled, loadConfig, resolveTimeoutMs, type RawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { setLogLevel } from "../logging/logger.js";
import { TreeSitterSyntaxChecker } from "../validation/syntax-checker.js";
import type { TestsmithConfig } from "../types/config.js";

export type ContextOptions = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  /** Shared by every adapter; config-derived fields are added per framework. */
  adapterOptions?: AdapterOptions;
};

export type CommandContext = {
  config: TestsmithConfig;
  registry: AdapterRegistry;
};

export type ContextResult = ({ ok: true } & CommandContext) | { ok: false; error: string };

/** Adapter options for one framework, or null when the config disables it. */
export function adapterOptionsFor(config: TestsmithConfig, framework: string, base: AdapterOptions = {}): AdapterOptions | null {
  if (!isFrameworkEnabled(config, framework)) return null;
  return {
    ...base,
    defaultTimeoutMs: base.defaultTimeoutMs ?? resolveTimeoutMs(config, framework),
    maxScanFiles: base.maxScanFiles ?? config.max_scan_files,
  };
}

/** Load and validate config, apply its log level, build the adapter registry. */
export async function loadContext(opts: ContextOptions = {}): Promise<ContextResult> {
  let raw: RawConfig;
  try {
    raw = loadConfig(opts.envName, opts.configDir, opts.env);
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  const checked = await validateConfig(raw);
  if (!checked.valid) return { ok: false, error: `Invalid config: ${checked.errors}` };

  const config = checked.config;
  setLogLevel(config.log_level);
  // One checker per context, so every adapter shares its grammar cache.
  const base: AdapterOptions = { syntaxChecker: new TreeSitterSyntaxChecker(), ...opts.adapterOptions };
  const registry = createDefaultRegistry((name) => adapterOptionsFor(config, name, base));
  return { ok: true, config, registry };
}
