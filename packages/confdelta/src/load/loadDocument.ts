import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import { LineCounter, parseDocument } from "yaml";

import { valueFromYamlDocument, YamlConversionError } from "../value/fromYaml.js";
import type { Value } from "../value/types.js";
import { errorMessage, NotFoundError, ParseError } from "../util/errors.js";
import { isErrno } from "../util/guards.js";

export interface ParseDocumentOptions {
  /** Receives parser warnings (e.g. unresolved custom tags); they do not fail the parse. */
  onWarning?: (message: string) => void;
  /** Cap on nodes produced by expanding aliases (default 10000). */
  maxAliasNodes?: number;
}

export interface LoadDocumentOptions extends ParseDocumentOptions {
  /** Base directory for relative paths (defaults to `process.cwd()`). */
  cwd?: string;
}

export interface LoadedDocument {
  /** The path as supplied by the caller. */
  filePath: string;
  text: string;
  value: Value;
}

/** Parse one YAML (or JSON) document into a value tree. */
export function parseDocumentText(text: string, sourceName: string, options: ParseDocumentOptions = {}): Value {
  const lineCounter = new LineCounter();
  const doc = parseDocument(text, { lineCounter, merge: true, uniqueKeys: true });

  const [first] = doc.errors;
  if (first) {
    const pos = first.linePos?.[0];
    throw new ParseError(sourceName, first.message, {
      cause: first,
      ...(pos ? { line: pos.line, col: pos.col } : {})
    });
  }

  for (const warning of doc.warnings) {
    options.onWarning?.(warning.message);
  }

  try {
    return valueFromYamlDocument(
      doc,
      lineCounter,
      options.maxAliasNodes !== undefined ? { maxAliasNodes: options.maxAliasNodes } : {}
    );
  } catch (err) {
    if (err instanceof YamlConversionError) {
      const loc = err.location;
      const where = loc ? ` at line ${loc.line}, column ${loc.col}` : "";
      throw new ParseError(sourceName, `${err.message}${where}`, {
        cause: err,
        ...(loc ? { line: loc.line, col: loc.col } : {})
      });
    }
    throw err;
  }
}

/** Read and parse a document file. Fails with `NotFoundError` or `ParseError`. */
export async function loadDocumentFile(filePath: string, options: LoadDocumentOptions = {}): Promise<LoadedDocument> {
  const absPath = path.resolve(options.cwd ?? process.cwd(), filePath);

  let text: string;
  try {
    text = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = isErrno(err) ? err.code : undefined;

    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new NotFoundError(filePath, `file not found: ${filePath}`, { cause: err });
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new NotFoundError(filePath, `cannot read file (permission denied): ${filePath}`, { cause: err });
    }

    if (code === "EISDIR") {
      throw new NotFoundError(filePath, `cannot read file (is a directory): ${filePath}`, { cause: err });
    }

    throw new NotFoundError(filePath, `failed to read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  const value = parseDocumentText(text, filePath, options);
  return { filePath, text, value };
}
