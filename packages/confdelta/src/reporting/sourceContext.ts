import type { SourceLocation } from "../value/types.js";

/**
 * Lines around `location`, each as `<marker> <lineNo> | <text>` with `>` on the located line.
 *
 * Line numbers are right-aligned to the widest number shown. Lines outside the text are skipped.
 */
export function formatSourceContext(text: string, location: SourceLocation, context: number): string[] {
  const lines = text.split(/\r?\n/);
  // A trailing newline does not start another line.
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  const first = Math.max(1, location.line - context);
  const last = Math.min(lines.length, location.line + context);
  const width = String(last).length;

  const out: string[] = [];
  for (let lineNo = first; lineNo <= last; lineNo++) {
    const marker = lineNo === location.line ? ">" : " ";
    const body = lines[lineNo - 1] ?? "";
    out.push(`${marker} ${String(lineNo).padStart(width)} | ${body}`.trimEnd());
  }
  return out;
}
