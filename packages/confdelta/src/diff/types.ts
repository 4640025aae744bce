import type { Value } from "../value/types.js";

/** A mapping key or a sequence index. */
export type PathSegment = string | number;

/** Keys/indices from the document root to a node. */
export type Path = readonly PathSegment[];

export interface AddedChange {
  kind: "added";
  path: Path;
  right: Value;
}

export interface RemovedChange {
  kind: "removed";
  path: Path;
  left: Value;
}

/** Both sides are scalars of the same kind with unequal values. */
export interface ValueChange {
  kind: "changed";
  path: Path;
  left: Value;
  right: Value;
}

/** The sides differ in scalar kind or structural category; the subtree is not descended. */
export interface TypeChange {
  kind: "type-changed";
  path: Path;
  left: Value;
  right: Value;
}

/** One structural difference between two value trees. */
export type Change = AddedChange | RemovedChange | ValueChange | TypeChange;

export type ChangeKind = Change["kind"];

export const KEY_ORDERS = ["document", "sorted"] as const;

export type KeyOrder = (typeof KEY_ORDERS)[number];

export type DiffOptions = {
  /**
   * Order in which mapping keys are visited.
   *
   * - `document`: left keys in insertion order (removed or recursed), then right-only keys (added).
   * - `sorted`: union of keys by UTF-16 code unit order.
   *
   * Defaults to `document`.
   */
  keyOrder?: KeyOrder;

  /** Absolute tolerance for numbers (defaults to 0). */
  tolAbs?: number;

  /** Relative tolerance for numbers (defaults to 0). */
  tolRel?: number;
};
