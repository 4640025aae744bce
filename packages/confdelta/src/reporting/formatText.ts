import { formatPath } from "../diff/path.js";
import type { Change } from "../diff/types.js";
import { assertNever } from "../util/invariant.js";
import { renderValue } from "../value/render.js";
import type { Value } from "../value/types.js";
import { formatSourceContext } from "./sourceContext.js";
import type { DiffReport, ReportSide } from "./types.js";

export interface TextFormatOptions {
  /** Source lines shown before and after each located change (0 disables context). */
  context?: number;
  /** Truncate rendered values longer than this (0 disables truncation). */
  maxValueWidth?: number;
  /** Append ` (L<line>:<col> R<line>:<col>)` for each side whose value has a location. */
  locations?: boolean;
}

function describeChange(change: Change, maxValueWidth: number): string {
  const path = formatPath(change.path);
  const show = (v: Value): string => renderValue(v, maxValueWidth);

  switch (change.kind) {
    case "added":
      return `${path}: added ${show(change.right)}`;
    case "removed":
      return `${path}: removed ${show(change.left)}`;
    case "changed":
      return `${path}: changed ${show(change.left)} -> ${show(change.right)}`;
    case "type-changed":
      return `${path}: type changed ${change.left.kind} ${show(change.left)} -> ${change.right.kind} ${show(change.right)}`;
    default:
      return assertNever(change);
  }
}

function locationSuffix(change: Change): string {
  const { left, right } = sideValues(change);
  const parts: string[] = [];
  if (left?.location) parts.push(`L${left.location.line}:${left.location.col}`);
  if (right?.location) parts.push(`R${right.location.line}:${right.location.col}`);
  return parts.length > 0 ? ` (${parts.join(" ")})` : "";
}

/** Render one change as `<path>: <what happened>`, optionally followed by its source locations. */
export function formatChangeLine(change: Change, maxValueWidth = 0, locations = false): string {
  const line = describeChange(change, maxValueWidth);
  return locations ? `${line}${locationSuffix(change)}` : line;
}

function sideValues(change: Change): { left?: Value; right?: Value } {
  switch (change.kind) {
    case "added":
      return { right: change.right };
    case "removed":
      return { left: change.left };
    case "changed":
    case "type-changed":
      return { left: change.left, right: change.right };
    default:
      return assertNever(change);
  }
}

function contextBlock(side: ReportSide, value: Value | undefined, context: number): string[] {
  const loc = value?.location;
  if (!loc || side.text === undefined) return [];

  return [
    `  ${side.label}:${loc.line}:${loc.col}`,
    ...formatSourceContext(side.text, loc, context).map((line) => `    ${line}`)
  ];
}

/** Format a diff report as plain text: one line per change, then a summary line. */
export function formatTextReport(report: DiffReport, options: TextFormatOptions = {}): string {
  const context = options.context ?? 0;
  const lines: string[] = [];

  for (const change of report.changes) {
    lines.push(formatChangeLine(change, options.maxValueWidth ?? 0, options.locations ?? false));

    if (context > 0) {
      const { left, right } = sideValues(change);
      lines.push(...contextBlock(report.left, left, context));
      lines.push(...contextBlock(report.right, right, context));
    }
  }

  const n = report.changes.length;
  lines.push(n === 0 ? "No differences found." : `${n} difference(s) found.`);

  return lines.join("\n");
}
