import type { RunResult } from "../types/result.js";
import type { ConfigMarkerProbe } from "../detection/heuristics.js";
import type { DirectRunProfile } from "../execution/binaries.js";
import { GTEST_JUNIT, parseJunitXml } from "../parsers/junit-xml.js";
import { CmakeAdapter } from "./cmake-adapter.js";

export class GTestAdapter extends CmakeAdapter {
  readonly name = "gtest";

  protected readonly cmakeProbe: ConfigMarkerProbe = {
    file: "CMakeLists.txt",
    name: "gtest",
    markers: ["find_package(gtest", "gtest_discover_tests", "target_link_libraries"],
  };

  protected readonly includePattern = /#include\s*[<"]gtest\/gtest\.h[>"]/;
  protected readonly testFilePatterns = ["**/*_test.cpp", "**/*_test.cc"];
  protected readonly binaryPatterns = ["*test*", "*_tests"];

  protected readonly directRun: DirectRunProfile = {
    label: "Google Test",
    reportName: (i) => `gtest-${i}.xml`,
    command: (binary, report) => [binary, `--gtest_output=xml:${report}`],
    parseReport: (xml, transcript) => parseJunitXml(xml, transcript, GTEST_JUNIT),
  };

  protected parseJunit(xml: string, transcript: string): RunResult {
    return parseJunitXml(xml, transcript, GTEST_JUNIT);
  }
}
