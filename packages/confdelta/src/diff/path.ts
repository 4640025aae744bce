import type { Path } from "./types.js";

const BARE_KEY_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** True when a key can be written in a path without brackets. */
export function isBareKey(key: string): boolean {
  return BARE_KEY_RE.test(key);
}

export function quoteKey(key: string): string {
  const escaped = key.replaceAll("\\", "\\\\").replaceAll("'", "\\'");
  return `'${escaped}'`;
}

/** Format a path as `a.b[2].c`; keys that are not identifiers become `['some.key']`. */
export function formatPath(path: Path): string {
  if (path.length === 0) return "(root)";

  let out = "";

  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
      continue;
    }

    if (isBareKey(segment)) {
      out += out.length === 0 ? segment : `.${segment}`;
      continue;
    }

    out += `[${quoteKey(segment)}]`;
  }

  return out;
}
