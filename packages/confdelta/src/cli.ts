#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { loadConfig } from "./config/loadConfig.js";
import type { ConfdeltaConfig } from "./config/types.js";
import { diff } from "./diff/diff.js";
import { KEY_ORDERS } from "./diff/types.js";
import type { KeyOrder } from "./diff/types.js";
import { loadDocumentFile } from "./load/loadDocument.js";
import type { LoadedDocument } from "./load/loadDocument.js";
import { formatJsonReport } from "./reporting/formatJson.js";
import { formatTextReport } from "./reporting/formatText.js";
import { formatYamlReport } from "./reporting/formatYaml.js";
import { OUTPUT_FORMATS } from "./reporting/types.js";
import type { DiffReport, OutputFormat } from "./reporting/types.js";
import { errorMessage, UsageError } from "./util/errors.js";
import { assertNever } from "./util/invariant.js";

/** Options parsed from CLI flags (after validation). Unset fields fall back to config, then defaults. */
export interface CliOptions {
  leftPath: string;
  rightPath: string;
  quiet: boolean;
  verbose: boolean;
  configPath?: string;
  format?: OutputFormat;
  keyOrder?: KeyOrder;
  context?: number;
  maxValueWidth?: number;
  locations?: boolean;
  tolAbs?: number;
  tolRel?: number;
}

export type ParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "run";
      options: CliOptions;
    };

/**
 * Returns a help/usage string for the `confdelta` CLI.
 */
export function usage(): string {
  return [
    "confdelta: semantic diff of two YAML/JSON documents",
    "",
    "Usage:",
    "  confdelta [options] <left> <right>",
    "",
    "Flags:",
    "  --format text|json|yaml          Output format (default: text)",
    "  -q, --quiet                      Print nothing; report through the exit code only",
    "  -C, --context <n>                Source lines of context per change (text only, default: 0)",
    "  --key-order document|sorted      Mapping key visit order (default: document)",
    "  --tolerance <abs>                Absolute tolerance for numbers (default: 0)",
    "  --rel-tolerance <rel>            Relative tolerance for numbers (default: 0)",
    "  --max-value-width <n>            Truncate rendered values (text only, 0 = off)",
    "  -l, --locations                  Append line:col of each side to every change (text only)",
    "  --config <path>                  Config file (default: .confdelta.yml if present)",
    "  -v, --verbose                    Print debug lines on stderr",
    "  -h, --help                       Show this help",
    "",
    "Comparison:",
    "  Mappings are compared by key; key order and formatting never count as changes.",
    "  Sequences are compared by position: a reordered list shows up as changed items,",
    "  and no attempt is made to detect moved or inserted elements.",
    "  A null compared with any other scalar is reported as a type change.",
    "",
    "Exit codes:",
    "  0 = no differences",
    "  1 = differences found",
    "  2 = usage, config, missing file or parse error"
  ].join("\n");
}

function parseNonNegativeInteger(flag: string, raw: string): number {
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(n)) {
    throw new UsageError(`${flag} must be a non-negative integer (got ${raw})`);
  }
  return n;
}

function parseTolerance(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new UsageError(`${flag} must be a non-negative number (got ${raw})`);
  }
  return n;
}

/**
 * Parses raw CLI argv into a strongly-typed run or help request.
 */
export function parseCliArgs(rawArgv: string[]): ParseResult {
  const positionals: string[] = [];
  const opts: Omit<CliOptions, "leftPath" | "rightPath"> = { quiet: false, verbose: false };
  let parsingFlags = true;

  for (let i = 0; i < rawArgv.length; i++) {
    const arg = rawArgv[i];
    if (arg === undefined) continue;

    if (parsingFlags && arg === "-") {
      throw new UsageError("reading from stdin is not supported; pass a file path (use -- before a file named -)");
    }

    if (!parsingFlags || !arg.startsWith("-")) {
      positionals.push(arg);
      continue;
    }

    if (arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    const take = (what: string): string => {
      const next = rawArgv[i + 1];
      if (next === undefined || (next.startsWith("-") && next !== "-")) {
        throw new UsageError(`${arg} requires ${what}`);
      }
      i++;
      return next;
    };

    if (arg === "--quiet" || arg === "-q") {
      opts.quiet = true;
      continue;
    }

    if (arg === "--locations" || arg === "-l") {
      opts.locations = true;
      continue;
    }

    if (arg === "--verbose" || arg === "-v") {
      opts.verbose = true;
      continue;
    }

    if (arg === "--format") {
      const next = rawArgv[i + 1];
      if (next !== "text" && next !== "json" && next !== "yaml") {
        throw new UsageError(`--format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
      }
      opts.format = next;
      i++;
      continue;
    }

    if (arg === "--key-order") {
      const next = rawArgv[i + 1];
      if (next !== "document" && next !== "sorted") {
        throw new UsageError(`--key-order must be one of: ${KEY_ORDERS.join(", ")}`);
      }
      opts.keyOrder = next;
      i++;
      continue;
    }

    if (arg === "--context" || arg === "-C") {
      opts.context = parseNonNegativeInteger(arg, take("<n>"));
      continue;
    }

    if (arg === "--max-value-width") {
      opts.maxValueWidth = parseNonNegativeInteger(arg, take("<n>"));
      continue;
    }

    if (arg === "--tolerance") {
      opts.tolAbs = parseTolerance(arg, take("<abs>"));
      continue;
    }

    if (arg === "--rel-tolerance") {
      opts.tolRel = parseTolerance(arg, take("<rel>"));
      continue;
    }

    if (arg === "--config") {
      opts.configPath = take("a <path>");
      continue;
    }

    throw new UsageError(`unknown flag: ${arg}`);
  }

  const [leftPath, rightPath, ...extra] = positionals;

  if (leftPath === undefined || rightPath === undefined) {
    throw new UsageError("expected two files to compare: <left> <right>");
  }

  if (extra.length > 0) {
    throw new UsageError(`unexpected positional arguments: ${extra.join(" ")}`);
  }

  return { kind: "run", options: { leftPath, rightPath, ...opts } };
}

/** Flags layered over config values layered over defaults. */
export interface EffectiveSettings {
  format: OutputFormat;
  keyOrder: KeyOrder;
  context: number;
  maxValueWidth: number;
  locations: boolean;
  tolAbs: number;
  tolRel: number;
}

export function resolveSettings(cli: CliOptions, config: ConfdeltaConfig): EffectiveSettings {
  return {
    format: cli.format ?? config.format ?? "text",
    keyOrder: cli.keyOrder ?? config.keyOrder ?? "document",
    context: cli.context ?? config.context ?? 0,
    maxValueWidth: cli.maxValueWidth ?? config.maxValueWidth ?? 0,
    locations: cli.locations ?? config.locations ?? false,
    tolAbs: cli.tolAbs ?? config.tolAbs ?? 0,
    tolRel: cli.tolRel ?? config.tolRel ?? 0
  };
}

function formatReport(report: DiffReport, settings: EffectiveSettings): string {
  switch (settings.format) {
    case "text":
      return formatTextReport(report, {
        context: settings.context,
        maxValueWidth: settings.maxValueWidth,
        locations: settings.locations
      });
    case "json":
      return formatJsonReport(report);
    case "yaml":
      return formatYamlReport(report);
    default:
      return assertNever(settings.format);
  }
}

/** IO dependencies for {@link main} (abstracted for testing). */
export interface MainIo {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * CLI entrypoint: loads config and both documents, diffs them, and writes a formatted report.
 */
export async function main(rawArgv: string[], io: MainIo): Promise<number> {
  try {
    const parsed = parseCliArgs(rawArgv);

    if (parsed.kind === "help") {
      io.stdout.write(`${usage()}\n`);
      return 0;
    }

    const cli = parsed.options;
    const debug = (message: string): void => {
      if (cli.verbose) io.stderr.write(`debug: ${message}\n`);
    };

    const loadedConfig = await loadConfig({
      cwd: io.cwd,
      stderr: io.stderr,
      ...(cli.configPath !== undefined ? { configPath: cli.configPath } : {})
    });
    debug(loadedConfig.configPath ? `using config ${loadedConfig.configPath}` : "no config file");

    const settings = resolveSettings(cli, loadedConfig.config);
    debug(
      `format=${settings.format} keyOrder=${settings.keyOrder} tolAbs=${settings.tolAbs} tolRel=${settings.tolRel}`
    );

    const load = (filePath: string): Promise<LoadedDocument> =>
      loadDocumentFile(filePath, {
        cwd: io.cwd,
        onWarning: (message) => io.stderr.write(`warning: ${filePath}: ${message}\n`)
      });

    // Both files load concurrently; failures are reported left first.
    const [leftResult, rightResult] = await Promise.allSettled([load(cli.leftPath), load(cli.rightPath)]);
    if (leftResult.status === "rejected") throw leftResult.reason;
    if (rightResult.status === "rejected") throw rightResult.reason;
    const left = leftResult.value;
    const right = rightResult.value;

    debug(`loaded ${left.filePath} (${left.value.kind}) and ${right.filePath} (${right.value.kind})`);

    const changes = diff(left.value, right.value, {
      keyOrder: settings.keyOrder,
      tolAbs: settings.tolAbs,
      tolRel: settings.tolRel
    });
    debug(`${changes.length} change(s)`);

    if (!cli.quiet) {
      const report: DiffReport = {
        left: { label: left.filePath, text: left.text },
        right: { label: right.filePath, text: right.text },
        changes
      };
      io.stdout.write(`${formatReport(report, settings)}\n`);
    }

    return changes.length > 0 ? 1 : 0;
  } catch (err) {
    const message = errorMessage(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    io.stderr.write(`error: ${message}\n`);
    return 2;
  }
}

const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  void main(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr
  }).then((code) => {
    process.exitCode = code;
  });
}
