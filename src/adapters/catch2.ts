import type { RunResult } from "../types/result.js";
import type { ConfigMarkerProbe } from "../detection/heuristics.js";
import type { DirectRunProfile } from "../execution/binaries.js";
import { CATCH2_JUNIT, parseJunitXml } from "../parsers/junit-xml.js";
import { parseCatch2Text } from "../parsers/catch2-text.js";
import { normalizeCatch2Source } from "../validation/gate.js";
import { CmakeAdapter } from "./cmake-adapter.js";

export class Catch2Adapter extends CmakeAdapter {
  readonly name = "catch2";

  protected readonly cmakeProbe: ConfigMarkerProbe = {
    file: "CMakeLists.txt",
    name: "catch2",
    markers: ["find_package(catch2", "catch_discover_tests", "catch2::catch2", "catch2::catch2withmain"],
  };

  protected readonly includePattern = /#include\s*[<"](catch2\/catch[^">]*|catch\.hpp)[>"]/;
  protected readonly testFilePatterns = ["**/*_test.cpp", "**/*_test.cc", "**/*.catch2.cpp", "**/*_tests.cpp"];
  protected readonly binaryPatterns = ["*test*", "*_tests", "*catch2*"];

  protected readonly directRun: DirectRunProfile = {
    label: "Catch2",
    reportName: (i) => `catch2-${i}.xml`,
    command: (binary, report) => [binary, "--reporter", "junit", "--out", report],
    parseReport: (xml, transcript) => parseJunitXml(xml, transcript, CATCH2_JUNIT),
    parseConsole: parseCatch2Text,
  };

  protected parseJunit(xml: string, transcript: string): RunResult {
    return parseJunitXml(xml, transcript, CATCH2_JUNIT);
  }

  /** Coverage only follows a green run. */
  protected coverageEligible(result: RunResult): boolean {
    return result.success;
  }

  protected prepareForValidation(source: string): string {
    return normalizeCatch2Source(source);
  }
}
