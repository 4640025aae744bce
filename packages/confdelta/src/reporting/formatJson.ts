import { renderNumber } from "../value/render.js";
import { serializeReport } from "./serialize.js";
import type { DiffReport } from "./types.js";

/** Format a diff report as pretty-printed JSON; non-finite numbers become `".nan"`, `".inf"`, `"-.inf"`. */
export function formatJsonReport(report: DiffReport): string {
  return JSON.stringify(
    serializeReport(report),
    (_k, v: unknown) => (typeof v === "number" && !Number.isFinite(v) ? renderNumber(v) : v),
    2
  );
}
