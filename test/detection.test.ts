import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { GTestAdapter } from "../src/adapters/gtest.js";
import { Catch2Adapter } from "../src/adapters/catch2.js";
import { XUnitAdapter } from "../src/adapters/xunit.js";
import { PytestAdapter, findPytestExecutable, pyprojectListsPytest } from "../src/adapters/pytest.js";
import { createDefaultRegistry } from "../src/adapters/registry.js";
import { walkFiles } from "../src/detection/fs-walk.js";
import { makeTempDir, writeTree } from "./helpers.js";

const dirs: string[] = [];

function project(files: Record<string, string> = {}): string {
  const dir = makeTempDir();
  dirs.push(dir);
  writeTree(dir, files);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe("walkFiles", () => {
  it("skips dot entries and node_modules, yielding a directory's files before its subdirectories", () => {
    const root = project({
      "b.txt": "",
      "a/c.txt": "",
      ".git/config": "",
      "node_modules/pkg/index.js": "",
    });
    expect([...walkFiles(root)].map((f) => path.relative(root, f))).toEqual(["b.txt", path.join("a", "c.txt")]);
  });

  it("stops at the file cap", () => {
    const root = project({ "a.txt": "", "b.txt": "", "c.txt": "" });
    expect([...walkFiles(root, { maxFiles: 2 })]).toHaveLength(2);
  });
});

describe("GTestAdapter.detect", () => {
  const adapter = new GTestAdapter();

  it("finds gtest wiring in CMakeLists.txt", () => {
    const root = project({ "CMakeLists.txt": "find_package(GTest REQUIRED)\ngtest_discover_tests(calc_tests)\n" });
    expect(adapter.detect(root)).toBe(true);
  });

  it("does not trust a bare mention of the name", () => {
    const root = project({ "CMakeLists.txt": "# we might use gtest someday\nproject(calc)\n" });
    expect(adapter.detect(root)).toBe(false);
  });

  it("finds the gtest include in sources", () => {
    const root = project({ "src/calc.cc": "#include <gtest/gtest.h>\n" });
    expect(adapter.detect(root)).toBe(true);
  });

  it("finds test files by name", () => {
    const root = project({ "tests/calc_test.cpp": "int main() { return 0; }\n" });
    expect(adapter.detect(root)).toBe(true);
  });

  it("ignores hidden directories", () => {
    const root = project({ ".cache/calc_test.cpp": "#include <gtest/gtest.h>\n" });
    expect(adapter.detect(root)).toBe(false);
  });

  it("rejects an empty project", () => {
    expect(adapter.detect(project())).toBe(false);
  });
});

describe("Catch2Adapter.detect", () => {
  const adapter = new Catch2Adapter();

  it("finds Catch2 targets in CMakeLists.txt", () => {
    const root = project({ "CMakeLists.txt": "target_link_libraries(tests PRIVATE Catch2::Catch2WithMain)\n" });
    expect(adapter.detect(root)).toBe(true);
    expect(new GTestAdapter().detect(root)).toBe(false);
  });

  it("finds both include styles", () => {
    expect(adapter.detect(project({ "src/a.cpp": '#include <catch2/catch_test_macros.hpp>\n' }))).toBe(true);
    expect(adapter.detect(project({ "src/b.hpp": '#include "catch.hpp"\n' }))).toBe(true);
  });

  it("finds *.catch2.cpp sources", () => {
    expect(adapter.detect(project({ "calc.catch2.cpp": "" }))).toBe(true);
  });
});

describe("XUnitAdapter.detect", () => {
  const adapter = new XUnitAdapter();

  it("finds an xunit package reference", () => {
    const root = project({
      "Calc.Tests/Calc.Tests.csproj": '<Project>\n  <PackageReference Include="xunit" Version="2.9.0" />\n</Project>\n',
    });
    expect(adapter.detect(root)).toBe(true);
  });

  it("needs test files alongside a using directive", () => {
    expect(adapter.detect(project({ "Calc.cs": "using Xunit;\n" }))).toBe(false);
    expect(adapter.detect(project({ "CalcTests.cs": "using Xunit;\n" }))).toBe(true);
  });

  it("ignores projects without xunit", () => {
    const root = project({ "App/App.csproj": '<PackageReference Include="NUnit" Version="4.0.0" />' });
    expect(adapter.detect(root)).toBe(false);
  });
});

describe("XUnitAdapter.findTestTarget", () => {
  const adapter = new XUnitAdapter();

  it("prefers a root solution", () => {
    const root = project({
      "Calc.sln": "",
      "Calc.Tests/Calc.Tests.csproj": '<PackageReference Include="xunit" />',
    });
    expect(adapter.findTestTarget(root)).toBe(path.join(root, "Calc.sln"));
  });

  it("then an xunit project, then any root project", () => {
    const nested = project({
      "App.csproj": "<Project />",
      "Calc.Tests/Calc.Tests.csproj": '<PackageReference Include="xunit" />',
    });
    expect(adapter.findTestTarget(nested)).toBe(path.join(nested, "Calc.Tests", "Calc.Tests.csproj"));

    const plain = project({ "App.csproj": "<Project />" });
    expect(adapter.findTestTarget(plain)).toBe(path.join(plain, "App.csproj"));
    expect(adapter.findTestTarget(project())).toBeNull();
  });
});

describe("PytestAdapter.detect", () => {
  const adapter = new PytestAdapter();

  it("finds pytest configuration files", () => {
    expect(adapter.detect(project({ "conftest.py": "" }))).toBe(true);
    expect(adapter.detect(project({ "pytest.ini": "[pytest]\n" }))).toBe(true);
    expect(adapter.detect(project({ "pyproject.toml": "[tool.pytest.ini_options]\naddopts = \"-q\"\n" }))).toBe(true);
    expect(adapter.detect(project({ "setup.cfg": "[tool:pytest]\ntestpaths = tests\n" }))).toBe(true);
  });

  it("finds pytest as a dependency", () => {
    const root = project({ "pyproject.toml": '[project]\nname = "calc"\ndependencies = ["pytest>=7"]\n' });
    expect(adapter.detect(root)).toBe(true);
  });

  it("does not count a project name alone", () => {
    expect(adapter.detect(project({ "pyproject.toml": '[project]\nname = "calc"\n' }))).toBe(false);
    expect(adapter.detect(project())).toBe(false);
  });
});

describe("pyprojectListsPytest", () => {
  it("skips table headers", () => {
    expect(pyprojectListsPytest("[pytest-extras]\n")).toBe(false);
    expect(pyprojectListsPytest('  "pytest-cov",\n')).toBe(true);
  });
});

describe("findPytestExecutable", () => {
  it("prefers a project virtualenv", () => {
    const root = project({ ".venv/bin/pytest": "" });
    expect(findPytestExecutable(root)).toBe(path.join(root, ".venv", "bin", "pytest"));
  });

  it("checks Scripts for Windows-style environments", () => {
    const root = project({ "venv/Scripts/pytest.exe": "" });
    expect(findPytestExecutable(root)).toBe(path.join(root, "venv", "Scripts", "pytest.exe"));
  });

  it("falls back to PATH lookup", () => {
    expect(findPytestExecutable(project())).toBe("pytest");
  });
});

describe("AdapterRegistry", () => {
  it("registers the built-in adapters", () => {
    const registry = createDefaultRegistry();
    expect(registry.names()).toEqual(["gtest", "catch2", "xunit", "pytest"]);
    expect(registry.get("xunit")?.language).toBe("csharp");
    expect(registry.forLanguage("cpp").map((a) => a.name)).toEqual(["gtest", "catch2"]);
  });

  it("refuses a second adapter under the same name", () => {
    const registry = createDefaultRegistry();
    expect(registry.register(new PytestAdapter())).toBe(false);
    expect(registry.list()).toHaveLength(4);
  });

  it("skips adapters the option factory disables", () => {
    const registry = createDefaultRegistry((name) => (name === "catch2" ? null : {}));
    expect(registry.has("catch2")).toBe(false);
    expect(registry.names()).toEqual(["gtest", "xunit", "pytest"]);
  });

  it("detects nothing in an empty directory", () => {
    expect(createDefaultRegistry().detectAll(project())).toEqual([]);
  });

  it("lists every adapter that claims a project", () => {
    const root = project({ "conftest.py": "", "tests/calc_test.cpp": "" });
    expect(createDefaultRegistry().detectAll(root).map((a) => a.name)).toEqual(["gtest", "catch2", "pytest"]);
  });
});
