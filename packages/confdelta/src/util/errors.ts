/** Error used for invalid CLI usage / flag combinations. */
export class UsageError extends Error {
  override name = "UsageError";
}

/** Error used for invalid or unreadable confdelta configuration. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/**
 * Base class for failures to turn an input file into a value tree.
 *
 * Carries the path exactly as the caller supplied it.
 */
export class LoadError extends Error {
  override name = "LoadError";
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.filePath = filePath;
  }
}

/** The input path does not exist or cannot be read. */
export class NotFoundError extends LoadError {
  override name = "NotFoundError";
}

/** The input text is not a valid single YAML document. */
export class ParseError extends LoadError {
  override name = "ParseError";
  /** Parser diagnostic, without the file path prefix. */
  readonly diagnostic: string;
  /** 1-based position of the first parser error, when the parser reports one. */
  readonly line?: number;
  readonly col?: number;

  constructor(
    filePath: string,
    diagnostic: string,
    options?: { cause?: unknown; line?: number; col?: number }
  ) {
    super(filePath, `invalid YAML in ${filePath}: ${diagnostic}`, { cause: options?.cause });
    this.diagnostic = diagnostic;
    if (options?.line !== undefined) this.line = options.line;
    if (options?.col !== undefined) this.col = options.col;
  }
}

/** Extract a printable message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
