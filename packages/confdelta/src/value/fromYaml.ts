import { isAlias, isMap, isScalar, isSeq } from "yaml";
import type { Document, LineCounter, Pair, YAMLMap } from "yaml";

import type { MappingValue, SourceLocation, Value } from "./types.js";

/** Raised while converting a parsed YAML tree; the loader wraps it into a `ParseError`. */
export class YamlConversionError extends Error {
  override name = "YamlConversionError";
  readonly location?: SourceLocation;

  constructor(message: string, location?: SourceLocation) {
    super(message);
    if (location) this.location = location;
  }
}

interface ConvertContext {
  doc: Document.Parsed;
  lineCounter: LineCounter;
  /** Alias targets currently being expanded (guards against self-referencing anchors). */
  expanding: Set<unknown>;
  /** Nesting depth of alias expansion; nodes are counted only while it is above zero. */
  aliasDepth: number;
  aliasNodes: number;
  maxAliasNodes: number;
  /** Where the outermost alias being expanded was written. */
  aliasSite: SourceLocation | undefined;
}

/** Default cap on nodes produced by expanding aliases. */
export const DEFAULT_MAX_ALIAS_NODES = 10_000;

const MERGE_KEY = "<<";

function locate(node: unknown, ctx: ConvertContext): SourceLocation | undefined {
  if (typeof node !== "object" || node === null || !("range" in node)) return undefined;
  const range = node.range;
  if (!Array.isArray(range) || typeof range[0] !== "number") return undefined;
  const pos = ctx.lineCounter.linePos(range[0]);
  return { line: pos.line, col: pos.col };
}

function withLocation<T extends Value>(value: T, location: SourceLocation | undefined): T {
  return location ? { ...value, location } : value;
}

function scalarToValue(raw: unknown, location: SourceLocation | undefined): Value {
  if (raw === null || raw === undefined) return withLocation({ kind: "null" }, location);

  switch (typeof raw) {
    case "boolean":
      return withLocation({ kind: "boolean", value: raw }, location);
    case "number":
      return withLocation({ kind: "number", value: raw }, location);
    case "bigint":
      return withLocation({ kind: "number", value: Number(raw) }, location);
    case "string":
      return withLocation({ kind: "string", value: raw }, location);
    default:
      break;
  }

  if (raw instanceof Date) {
    return withLocation({ kind: "string", value: raw.toISOString() }, location);
  }

  return withLocation({ kind: "string", value: String(raw) }, location);
}

function keyToString(key: unknown, ctx: ConvertContext): string {
  // Mirrors the parser's own JS conversion: a null key becomes "".
  if (key === null || key === undefined) return "";

  const target = isAlias(key) ? key.resolve(ctx.doc) : key;

  if (isScalar(target)) {
    const raw = target.value;
    if (raw === null || raw === undefined) return "";
    if (raw instanceof Date) return raw.toISOString();
    return String(raw);
  }

  if (isMap(target) || isSeq(target)) {
    return JSON.stringify(target.toJSON());
  }

  throw new YamlConversionError("unsupported mapping key", locate(key, ctx));
}

function isMergeKey(key: unknown): boolean {
  if (!isScalar(key)) return false;
  const raw = key.value;
  // Newer parser releases resolve `<<` to a symbol; older ones keep the plain string.
  if (typeof raw === "symbol") return raw.description === MERGE_KEY;
  return raw === MERGE_KEY && key.type === "PLAIN";
}

/** Mappings named by a `<<` value: one mapping, or a sequence of them. */
function mergeSources(pair: Pair, ctx: ConvertContext, location: SourceLocation | undefined): MappingValue[] {
  const keyLocation = locate(pair.key, ctx) ?? location;
  const source = convertNode(pair.value, ctx, keyLocation);
  const candidates: readonly Value[] = source.kind === "sequence" ? source.items : [source];

  return candidates.map((candidate) => {
    if (candidate.kind !== "mapping") {
      throw new YamlConversionError(
        "merge key value must be a mapping or a sequence of mappings",
        candidate.location ?? keyLocation
      );
    }
    return candidate;
  });
}

function convertMapping(node: YAMLMap, ctx: ConvertContext, location: SourceLocation | undefined): Value {
  const explicit = new Set<string>();
  for (const pair of node.items) {
    if (isMergeKey(pair.key)) continue;
    const key = keyToString(pair.key, ctx);
    if (explicit.has(key)) {
      throw new YamlConversionError(
        `duplicate mapping key ${JSON.stringify(key)} after conversion to string`,
        locate(pair.key, ctx)
      );
    }
    explicit.add(key);
  }

  const entries = new Map<string, Value>();
  for (const pair of node.items) {
    if (isMergeKey(pair.key)) {
      // Keys written in this mapping win; among merged mappings the first one wins.
      for (const source of mergeSources(pair, ctx, location)) {
        for (const [key, value] of source.entries) {
          if (!explicit.has(key) && !entries.has(key)) entries.set(key, value);
        }
      }
      continue;
    }

    const keyLocation = locate(pair.key, ctx);
    // `key:` with no value is located at its key.
    entries.set(keyToString(pair.key, ctx), convertNode(pair.value, ctx, keyLocation ?? location));
  }

  return withLocation({ kind: "mapping", entries }, location);
}

function convertNode(node: unknown, ctx: ConvertContext, fallback?: SourceLocation): Value {
  if (ctx.aliasDepth > 0) {
    ctx.aliasNodes += 1;
    if (ctx.aliasNodes > ctx.maxAliasNodes) {
      throw new YamlConversionError(`aliases expand to more than ${ctx.maxAliasNodes} nodes`, ctx.aliasSite);
    }
  }

  if (node === null || node === undefined) {
    return withLocation({ kind: "null" }, fallback);
  }

  if (isAlias(node)) {
    const target = node.resolve(ctx.doc);
    if (target === undefined) {
      throw new YamlConversionError(`unresolved alias *${node.source}`, locate(node, ctx));
    }
    if (ctx.expanding.has(target)) {
      throw new YamlConversionError(`alias *${node.source} refers to itself`, locate(node, ctx));
    }

    ctx.expanding.add(target);
    if (ctx.aliasDepth === 0) ctx.aliasSite = locate(node, ctx);
    ctx.aliasDepth += 1;
    try {
      // Report changes at the alias site rather than at the anchor.
      return withLocation(convertNode(target, ctx), locate(node, ctx));
    } finally {
      ctx.aliasDepth -= 1;
      ctx.expanding.delete(target);
    }
  }

  const location = locate(node, ctx) ?? fallback;

  if (isScalar(node)) {
    return scalarToValue(node.value, location);
  }

  if (isSeq(node)) {
    ctx.expanding.add(node);
    try {
      const items = node.items.map((item) => convertNode(item, ctx, location));
      return withLocation({ kind: "sequence", items }, location);
    } finally {
      ctx.expanding.delete(node);
    }
  }

  if (isMap(node)) {
    ctx.expanding.add(node);
    try {
      return convertMapping(node, ctx, location);
    } finally {
      ctx.expanding.delete(node);
    }
  }

  throw new YamlConversionError("unsupported YAML node", location);
}

/**
 * Convert a parsed YAML document (core schema) into a {@link Value} tree with source locations.
 *
 * The document must have been parsed with `lineCounter` attached.
 */
export function valueFromYamlDocument(
  doc: Document.Parsed,
  lineCounter: LineCounter,
  options: { maxAliasNodes?: number } = {}
): Value {
  return convertNode(doc.contents, {
    doc,
    lineCounter,
    expanding: new Set(),
    aliasDepth: 0,
    aliasNodes: 0,
    aliasSite: undefined,
    maxAliasNodes: options.maxAliasNodes ?? DEFAULT_MAX_ALIAS_NODES
  });
}
