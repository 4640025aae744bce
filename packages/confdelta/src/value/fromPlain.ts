import { formatPath } from "../diff/path.js";
import type { PathSegment } from "../diff/types.js";
import { isPlainObject } from "../util/guards.js";
import type { Value } from "./types.js";

function convert(data: unknown, path: PathSegment[]): Value {
  if (data === null) return { kind: "null" };

  switch (typeof data) {
    case "boolean":
      return { kind: "boolean", value: data };
    case "number":
      return { kind: "number", value: data };
    case "bigint":
      return { kind: "number", value: Number(data) };
    case "string":
      return { kind: "string", value: data };
    default:
      break;
  }

  if (Array.isArray(data)) {
    return { kind: "sequence", items: data.map((item, i) => convert(item, [...path, i])) };
  }

  if (data instanceof Date) {
    return { kind: "string", value: data.toISOString() };
  }

  if (data instanceof Map) {
    const entries = new Map<string, Value>();
    for (const [k, v] of data) {
      const key = String(k);
      if (entries.has(key)) {
        throw new TypeError(`duplicate key ${JSON.stringify(key)} at ${formatPath(path)}`);
      }
      entries.set(key, convert(v, [...path, key]));
    }
    return { kind: "mapping", entries };
  }

  if (isPlainObject(data)) {
    const entries = new Map<string, Value>();
    for (const [key, v] of Object.entries(data)) {
      entries.set(key, convert(v, [...path, key]));
    }
    return { kind: "mapping", entries };
  }

  const tag = data === undefined ? "undefined" : Object.prototype.toString.call(data);
  throw new TypeError(`unsupported value (${tag}) at ${formatPath(path)}`);
}

/**
 * Build a {@link Value} tree from JSON-like data (e.g. `JSON.parse` output).
 *
 * Throws `TypeError` for `undefined`, functions, symbols and class instances.
 */
export function fromPlain(data: unknown): Value {
  return convert(data, []);
}
