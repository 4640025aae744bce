import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import YAML from "yaml";

import { KEY_ORDERS } from "../diff/types.js";
import type { KeyOrder } from "../diff/types.js";
import { OUTPUT_FORMATS } from "../reporting/types.js";
import type { OutputFormat } from "../reporting/types.js";
import { ConfigError, errorMessage } from "../util/errors.js";
import { hasOwn, isErrno, isRecord } from "../util/guards.js";
import { DEFAULT_CONFIG_FILE, KNOWN_CONFIG_KEYS } from "./types.js";
import type { ConfdeltaConfig } from "./types.js";

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((v) => v === value);
}

function assertNonNegativeInteger(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer (got ${JSON.stringify(value)})`);
  }
  return value;
}

function assertTolerance(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative number (got ${JSON.stringify(value)})`);
  }
  return value;
}

/** Validate parsed config data. `sourceName` is only used in warnings. */
export function validateConfig(
  parsed: unknown,
  sourceName: string,
  stderr: NodeJS.WritableStream = process.stderr
): ConfdeltaConfig {
  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const config: ConfdeltaConfig = { schemaVersion: 1 };

  if (hasOwn(parsed, "format")) {
    const format: unknown = parsed.format;
    if (!isOneOf<OutputFormat>(OUTPUT_FORMATS, format)) {
      throw new ConfigError(`format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
    }
    config.format = format;
  }

  if (hasOwn(parsed, "keyOrder")) {
    const keyOrder: unknown = parsed.keyOrder;
    if (!isOneOf<KeyOrder>(KEY_ORDERS, keyOrder)) {
      throw new ConfigError(`keyOrder must be one of: ${KEY_ORDERS.join(", ")}`);
    }
    config.keyOrder = keyOrder;
  }

  if (hasOwn(parsed, "context")) {
    config.context = assertNonNegativeInteger("context", parsed.context);
  }

  if (hasOwn(parsed, "maxValueWidth")) {
    config.maxValueWidth = assertNonNegativeInteger("maxValueWidth", parsed.maxValueWidth);
  }

  if (hasOwn(parsed, "locations")) {
    const locations: unknown = parsed.locations;
    if (typeof locations !== "boolean") {
      throw new ConfigError(`locations must be a boolean (got ${JSON.stringify(locations)})`);
    }
    config.locations = locations;
  }

  if (hasOwn(parsed, "tolerance")) {
    const tolerance: unknown = parsed.tolerance;
    if (!isRecord(tolerance)) {
      throw new ConfigError("tolerance must be an object");
    }
    if (hasOwn(tolerance, "abs")) config.tolAbs = assertTolerance("tolerance.abs", tolerance.abs);
    if (hasOwn(tolerance, "rel")) config.tolRel = assertTolerance("tolerance.rel", tolerance.rel);
  }

  // Accept unknown keys for forward-compat, but tell the user.
  const known: readonly string[] = KNOWN_CONFIG_KEYS;
  const unknownKeys = Object.keys(parsed).filter((k) => !known.includes(k));
  if (unknownKeys.length > 0) {
    stderr.write(`warning: unknown key(s) in ${sourceName}: ${unknownKeys.sort().join(", ")} (ignoring)\n`);
  }

  return config;
}

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit config path; when absent, `.confdelta.yml` in `cwd` is used if it exists. */
  configPath?: string;
  stderr?: NodeJS.WritableStream;
}

export interface LoadedConfig {
  /** `undefined` when no config file was found (defaults apply). */
  configPath?: string;
  config: ConfdeltaConfig;
}

export async function loadConfig(opts: LoadConfigOptions): Promise<LoadedConfig> {
  const explicit = opts.configPath !== undefined;
  const configPath = opts.configPath ?? DEFAULT_CONFIG_FILE;
  const absPath = path.resolve(opts.cwd, configPath);
  const stderr = opts.stderr ?? process.stderr;

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = isErrno(err) ? err.code : undefined;

    if (code === "ENOENT") {
      if (!explicit) return { config: { schemaVersion: 1 } };
      throw new ConfigError(`config not found: ${configPath}`, { cause: err });
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${configPath}`, { cause: err });
    }

    throw new ConfigError(`failed to read config ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  return { configPath, config: validateConfig(parsed, configPath, stderr) };
}
