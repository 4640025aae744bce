import type { MappingValue, SequenceValue, Value } from "../value/types.js";
import { categoryOf } from "../value/types.js";
import { assertNever } from "../util/invariant.js";
import { numbersEqual } from "./numbers.js";
import type { Change, DiffOptions, KeyOrder, PathSegment } from "./types.js";

type ResolvedOptions = {
  keyOrder: KeyOrder;
  tolAbs: number;
  tolRel: number;
};

function scalarsEqual(left: Value, right: Value, opts: ResolvedOptions): boolean {
  switch (left.kind) {
    case "null":
      return right.kind === "null";
    case "boolean":
    case "string":
      return right.kind === left.kind && right.value === left.value;
    case "number":
      return right.kind === "number" && numbersEqual(left.value, right.value, opts.tolAbs, opts.tolRel);
    case "sequence":
    case "mapping":
      return false;
    default:
      return assertNever(left);
  }
}

function diffMappings(
  left: MappingValue,
  right: MappingValue,
  path: PathSegment[],
  opts: ResolvedOptions,
  out: Change[]
): void {
  const visit = (key: string): void => {
    const l = left.entries.get(key);
    const r = right.entries.get(key);
    const keyPath = [...path, key];

    if (l !== undefined && r !== undefined) {
      diffInner(l, r, keyPath, opts, out);
    } else if (l !== undefined) {
      out.push({ kind: "removed", path: keyPath, left: l });
    } else if (r !== undefined) {
      out.push({ kind: "added", path: keyPath, right: r });
    }
  };

  if (opts.keyOrder === "sorted") {
    const keys = new Set<string>([...left.entries.keys(), ...right.entries.keys()]);
    for (const key of [...keys].sort()) visit(key);
    return;
  }

  for (const key of left.entries.keys()) visit(key);
  for (const key of right.entries.keys()) {
    if (!left.entries.has(key)) visit(key);
  }
}

function diffSequences(
  left: SequenceValue,
  right: SequenceValue,
  path: PathSegment[],
  opts: ResolvedOptions,
  out: Change[]
): void {
  const n = Math.max(left.items.length, right.items.length);

  for (let i = 0; i < n; i++) {
    const l = left.items[i];
    const r = right.items[i];
    const itemPath = [...path, i];

    if (l !== undefined && r !== undefined) {
      diffInner(l, r, itemPath, opts, out);
    } else if (l !== undefined) {
      out.push({ kind: "removed", path: itemPath, left: l });
    } else if (r !== undefined) {
      out.push({ kind: "added", path: itemPath, right: r });
    }
  }
}

function diffInner(left: Value, right: Value, path: PathSegment[], opts: ResolvedOptions, out: Change[]): void {
  const leftCategory = categoryOf(left);

  if (leftCategory !== categoryOf(right)) {
    out.push({ kind: "type-changed", path, left, right });
    return;
  }

  if (left.kind === "mapping" && right.kind === "mapping") {
    diffMappings(left, right, path, opts, out);
    return;
  }

  if (left.kind === "sequence" && right.kind === "sequence") {
    diffSequences(left, right, path, opts, out);
    return;
  }

  // Both scalars from here on.
  if (left.kind !== right.kind) {
    out.push({ kind: "type-changed", path, left, right });
    return;
  }

  if (!scalarsEqual(left, right, opts)) {
    out.push({ kind: "changed", path, left, right });
  }
}

/**
 * Structurally compare two value trees.
 *
 * Mappings are compared by key (order-insensitive), sequences by aligned index (no reorder
 * detection). Changes come out depth-first; the result is empty iff the trees are equal.
 */
export function diff(left: Value, right: Value, options: DiffOptions = {}): Change[] {
  const opts: ResolvedOptions = {
    keyOrder: options.keyOrder ?? "document",
    tolAbs: options.tolAbs ?? 0,
    tolRel: options.tolRel ?? 0
  };

  const out: Change[] = [];
  diffInner(left, right, [], opts, out);
  return out;
}
