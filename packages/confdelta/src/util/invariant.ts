/**
 * Exhaustiveness helper for `switch` statements.
 *
 * Throws an error if called.
 */
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}
