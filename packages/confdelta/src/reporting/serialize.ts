import { formatPath } from "../diff/path.js";
import type { Change, ChangeKind, PathSegment } from "../diff/types.js";
import { toPlain } from "../value/toPlain.js";
import type { PlainValue } from "../value/toPlain.js";
import type { SourceLocation } from "../value/types.js";
import type { DiffReport } from "./types.js";

/** Machine-readable form of a change, shared by the JSON and YAML formatters. */
export interface SerializedChange {
  path: string;
  segments: PathSegment[];
  kind: ChangeKind;
  left?: PlainValue;
  right?: PlainValue;
  leftLocation?: SourceLocation;
  rightLocation?: SourceLocation;
}

export interface SerializedReport {
  left: string;
  right: string;
  changeCount: number;
  changes: SerializedChange[];
}

export function serializeChange(change: Change): SerializedChange {
  const out: SerializedChange = {
    path: formatPath(change.path),
    segments: [...change.path],
    kind: change.kind
  };

  if (change.kind !== "added") {
    out.left = toPlain(change.left);
    if (change.left.location) out.leftLocation = { ...change.left.location };
  }

  if (change.kind !== "removed") {
    out.right = toPlain(change.right);
    if (change.right.location) out.rightLocation = { ...change.right.location };
  }

  return out;
}

export function serializeReport(report: DiffReport): SerializedReport {
  return {
    left: report.left.label,
    right: report.right.label,
    changeCount: report.changes.length,
    changes: report.changes.map(serializeChange)
  };
}
