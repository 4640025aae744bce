import { isBareKey, quoteKey } from "../diff/path.js";
import { assertNever } from "../util/invariant.js";
import type { Value } from "./types.js";

/** YAML-style spelling for numbers JSON cannot express. */
export function renderNumber(n: number): string {
  if (Number.isNaN(n)) return ".nan";
  if (n === Infinity) return ".inf";
  if (n === -Infinity) return "-.inf";
  if (Object.is(n, -0)) return "-0";
  return String(n);
}

function render(value: Value): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
      return value.value ? "true" : "false";
    case "number":
      return renderNumber(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "sequence":
      return `[${value.items.map(render).join(", ")}]`;
    case "mapping": {
      const parts: string[] = [];
      for (const [k, v] of value.entries) {
        parts.push(`${isBareKey(k) ? k : quoteKey(k)}: ${render(v)}`);
      }
      return `{${parts.join(", ")}}`;
    }
    default:
      return assertNever(value);
  }
}

/**
 * Render a value on one line, in flow style.
 *
 * With `maxWidth > 3`, longer output is cut and suffixed with `...` so the result is exactly `maxWidth` long.
 */
export function renderValue(value: Value, maxWidth = 0): string {
  const out = render(value);
  if (maxWidth > 3 && out.length > maxWidth) {
    return `${out.slice(0, maxWidth - 3)}...`;
  }
  return out;
}
