import type { Change } from "../diff/types.js";

/** One input of a comparison, as shown in reports. */
export interface ReportSide {
  label: string;
  /** Source text; needed only to print context lines. */
  text?: string;
}

/** Everything a formatter needs to render one comparison. */
export interface DiffReport {
  left: ReportSide;
  right: ReportSide;
  changes: readonly Change[];
}

export const OUTPUT_FORMATS = ["text", "json", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
