import { assertNever } from "../util/invariant.js";
import type { Value } from "./types.js";

export type PlainValue = null | boolean | number | string | PlainValue[] | { [key: string]: PlainValue };

/** Convert a value tree back into plain JS data (objects keep the mapping's key order). */
export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case "null":
      return null;
    case "boolean":
    case "number":
    case "string":
      return value.value;
    case "sequence":
      return value.items.map(toPlain);
    case "mapping": {
      const out: { [key: string]: PlainValue } = {};
      for (const [k, v] of value.entries) {
        // `__proto__` must become an own property, not a prototype swap.
        Object.defineProperty(out, k, { value: toPlain(v), enumerable: true, writable: true, configurable: true });
      }
      return out;
    }
    default:
      return assertNever(value);
  }
}
