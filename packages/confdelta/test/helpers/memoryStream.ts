import { Writable } from "node:stream";

/** Writable that keeps everything written to it, for asserting on CLI output. */
export function memoryStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
      callback();
    }
  });
  return { stream, text: () => chunks.join("") };
}
