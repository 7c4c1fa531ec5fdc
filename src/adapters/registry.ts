import { createLogger } from "../logging/logger.js";
import type { AdapterOptions, TestFrameworkAdapter } from "./base.js";
import { Catch2Adapter } from "./catch2.js";
import { GTestAdapter } from "./gtest.js";
import { PytestAdapter } from "./pytest.js";
import { XUnitAdapter } from "./xunit.js";

const log = createLogger("registry");

export const BUILTIN_FRAMEWORKS = ["gtest", "catch2", "xunit", "pytest"] as const;
export type BuiltinFramework = (typeof BUILTIN_FRAMEWORKS)[number];

/** Name-keyed adapter lookup. Registration order is preserved. */
export class AdapterRegistry {
  private readonly adapters = new Map<string, TestFrameworkAdapter>();

  /** Returns false, keeping the existing adapter, when the name is taken. */
  register(adapter: TestFrameworkAdapter): boolean {
    if (this.adapters.has(adapter.name)) {
      log.warn("duplicate adapter ignored", { name: adapter.name });
      return false;
    }
    this.adapters.set(adapter.name, adapter);
    return true;
  }

  get(name: string): TestFrameworkAdapter | undefined {
    return this.adapters.get(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  list(): TestFrameworkAdapter[] {
    return [...this.adapters.values()];
  }

  names(): string[] {
    return [...this.adapters.keys()];
  }

  forLanguage(language: string): TestFrameworkAdapter[] {
    return this.list().filter((a) => a.language === language);
  }

  /** Every adapter whose detection fires for the project. */
  detectAll(projectRoot: string): TestFrameworkAdapter[] {
    const found = this.list().filter((a) => a.detect(projectRoot));
    log.debug("detection finished", { project: projectRoot, detected: found.map((a) => a.name) });
    return found;
  }
}

function createBuiltin(name: BuiltinFramework, opts: AdapterOptions): TestFrameworkAdapter {
  switch (name) {
    case "gtest":
      return new GTestAdapter(opts);
    case "catch2":
      return new Catch2Adapter(opts);
    case "xunit":
      return new XUnitAdapter(opts);
    case "pytest":
      return new PytestAdapter(opts);
  }
}

/**
 * Registry with the built-in adapters. `optionsFor` customizes each one,
 * e.g. with a configured timeout; returning null leaves it out.
 */
export function createDefaultRegistry(
  optionsFor: (name: BuiltinFramework) => AdapterOptions | null = () => ({}),
): AdapterRegistry {
  const registry = new AdapterRegistry();
  for (const name of BUILTIN_FRAMEWORKS) {
    const opts = optionsFor(name);
    if (opts !== null) registry.register(createBuiltin(name, opts));
  }
  return registry;
}
