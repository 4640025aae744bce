import YAML from "yaml";

import { serializeReport } from "./serialize.js";
import type { DiffReport } from "./types.js";

/** Format a diff report as a YAML document (same structure as the JSON output). */
export function formatYamlReport(report: DiffReport): string {
  return YAML.stringify(serializeReport(report), { aliasDuplicateObjects: false }).trimEnd();
}
