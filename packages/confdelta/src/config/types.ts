import type { KeyOrder } from "../diff/types.js";
import type { OutputFormat } from "../reporting/types.js";

/** Defaults read from a config file; every field is optional and CLI flags win. */
export interface ConfdeltaConfig {
  schemaVersion: 1;
  format?: OutputFormat;
  keyOrder?: KeyOrder;
  context?: number;
  maxValueWidth?: number;
  locations?: boolean;
  tolAbs?: number;
  tolRel?: number;
}

export const DEFAULT_CONFIG_FILE = ".confdelta.yml";

export const KNOWN_CONFIG_KEYS = [
  "schemaVersion",
  "format",
  "keyOrder",
  "context",
  "maxValueWidth",
  "locations",
  "tolerance"
] as const;
