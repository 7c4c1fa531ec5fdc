/** Configuration types for the layered config system. */
import type { LogLevel } from "../logging/logger.js";

export type FrameworkConfig = {
  enabled?: boolean;
  /** Overrides the global `timeout_seconds` for this framework. */
  timeout_seconds?: number;
};

export type TestsmithConfig = {
  schema_version: string;
  log_level: LogLevel;
  timeout_seconds: number;
  collect_coverage?: boolean;
  max_scan_files?: number;
  frameworks?: Record<string, FrameworkConfig>;
};
