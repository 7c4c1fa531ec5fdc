import { describe, expect, it } from "vitest";
import path from "node:path";
import { coerceEnvValue, deepMerge, loadConfig, resolveTimeoutMs, isFrameworkEnabled } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { adapterOptionsFor, loadContext } from "../src/commands/context.js";
import type { SyntaxChecker, SyntaxLanguage } from "../src/validation/syntax-checker.js";
import type { TestsmithConfig } from "../src/types/config.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

async function validated(envName?: string, env: NodeJS.ProcessEnv = {}): Promise<TestsmithConfig> {
  const checked = await validateConfig(loadConfig(envName, CONFIG_DIR, env));
  if (!checked.valid) throw new Error(checked.errors);
  return checked.config;
}

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config.log_level).toBe("info");
    expect(config.timeout_seconds).toBe(180);
    expect(config.collect_coverage).toBe(true);
    expect(config.frameworks).toEqual({
      gtest: { enabled: true },
      catch2: { enabled: true },
      xunit: { enabled: true },
      pytest: { enabled: true, timeout_seconds: 120 },
    });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("ci", CONFIG_DIR, {});
    expect(config.log_level).toBe("warn");
    expect(config.timeout_seconds).toBe(600);
    expect(config.collect_coverage).toBe(false);
    // nested keys merge instead of replacing the framework block
    expect(config.frameworks).toEqual({
      gtest: { enabled: true },
      catch2: { enabled: true },
      xunit: { enabled: true },
      pytest: { enabled: true, timeout_seconds: 300 },
    });
    expect(config.schema_version).toBe("1.0.0");
  });

  it("applies TESTSMITH_ environment overrides with coercion", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {
      TESTSMITH_LOG_LEVEL: "debug",
      TESTSMITH_TIMEOUT_SECONDS: "30",
      TESTSMITH_FRAMEWORKS__XUNIT__ENABLED: "false",
      UNRELATED_TIMEOUT_SECONDS: "1",
    });
    expect(config.log_level).toBe("debug");
    expect(config.timeout_seconds).toBe(30);
    expect(config.frameworks).toMatchObject({ xunit: { enabled: false }, gtest: { enabled: true } });
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig("ci", CONFIG_DIR, { TESTSMITH_FRAMEWORKS__PYTEST__TIMEOUT_SECONDS: "45" });
    expect(config.frameworks).toMatchObject({ pytest: { enabled: true, timeout_seconds: 45 } });
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, {});
    expect(config.timeout_seconds).toBe(180);
  });

  it("coerces numbers and booleans only", () => {
    expect(coerceEnvValue("42")).toBe(42);
    expect(coerceEnvValue("-1.5")).toBe(-1.5);
    expect(coerceEnvValue("true")).toBe(true);
    expect(coerceEnvValue("false")).toBe(false);
    expect(coerceEnvValue("1e3")).toBe("1e3");
    expect(coerceEnvValue("")).toBe("");
  });

  it("replaces arrays when merging", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1 } }, { a: [3], b: { d: 2 } })).toEqual({ a: [3], b: { c: 1, d: 2 } });
  });
});

describe("config validator", () => {
  it("validates a correct base config", async () => {
    const { valid, errors } = await validateConfig(loadConfig(undefined, CONFIG_DIR, {}));
    expect(valid).toBe(true);
    expect(errors).toBeNull();
  });

  it("validates the ci overlay", async () => {
    const { valid } = await validateConfig(loadConfig("ci", CONFIG_DIR, {}));
    expect(valid).toBe(true);
  });

  it("rejects an unknown log level", async () => {
    const { valid, errors } = await validateConfig({ schema_version: "1.0.0", log_level: "loud", timeout_seconds: 10 });
    expect(valid).toBe(false);
    expect(errors).toContain("/log_level");
  });

  it("rejects a missing timeout", async () => {
    const { valid, errors } = await validateConfig({ schema_version: "1.0.0", log_level: "info" });
    expect(valid).toBe(false);
    expect(errors).toContain("must have required property 'timeout_seconds'");
  });

  it("rejects unknown framework settings", async () => {
    const { valid } = await validateConfig({
      schema_version: "1.0.0",
      log_level: "info",
      timeout_seconds: 10,
      frameworks: { gtest: { enabeld: true } },
    });
    expect(valid).toBe(false);
  });

  it("rejects a non-positive timeout from the environment", async () => {
    const { valid } = await validateConfig(loadConfig(undefined, CONFIG_DIR, { TESTSMITH_TIMEOUT_SECONDS: "0" }));
    expect(valid).toBe(false);
  });
});

describe("framework settings", () => {
  it("prefers the framework timeout over the global one", async () => {
    const config = await validated();
    expect(resolveTimeoutMs(config, "pytest")).toBe(120_000);
    expect(resolveTimeoutMs(config, "gtest")).toBe(180_000);
    expect(resolveTimeoutMs(config, "unknown")).toBe(180_000);
  });

  it("treats frameworks as enabled unless switched off", async () => {
    const config = await validated(undefined, { TESTSMITH_FRAMEWORKS__CATCH2__ENABLED: "false" });
    expect(isFrameworkEnabled(config, "catch2")).toBe(false);
    expect(isFrameworkEnabled(config, "gtest")).toBe(true);
    expect(isFrameworkEnabled(config, "unlisted")).toBe(true);
  });

  it("derives adapter options from config", async () => {
    const config = await validated("ci");
    expect(adapterOptionsFor(config, "pytest")).toEqual({ defaultTimeoutMs: 300_000, maxScanFiles: 5000 });
    expect(adapterOptionsFor(config, "gtest", { defaultTimeoutMs: 1000 })).toEqual({
      defaultTimeoutMs: 1000,
      maxScanFiles: 5000,
    });
  });

  it("leaves disabled frameworks without options", async () => {
    const config = await validated(undefined, { TESTSMITH_FRAMEWORKS__XUNIT__ENABLED: "false" });
    expect(adapterOptionsFor(config, "xunit")).toBeNull();
  });
});

describe("loadContext", () => {
  it("hands every adapter the same syntax checker", async () => {
    const languages: SyntaxLanguage[] = [];
    const checker: SyntaxChecker = {
      parse: async (_source, language) => {
        languages.push(language);
        return {
          rootNode: {
            type: "root",
            isMissing: false,
            hasError: false,
            startPosition: { row: 0, column: 0 },
            endPosition: { row: 0, column: 0 },
            childCount: 0,
            child: () => null,
          },
        };
      },
      hasErrors: () => false,
      errorRanges: () => [],
    };

    const ctx = await loadContext({
      configDir: CONFIG_DIR,
      env: { TESTSMITH_LOG_LEVEL: "silent" },
      adapterOptions: { syntaxChecker: checker },
    });
    if (!ctx.ok) throw new Error(ctx.error);
    for (const adapter of ctx.registry.list()) await adapter.validateTest("x");

    expect(languages).toEqual(["cpp", "cpp", "csharp", "python"]);
  });
});
