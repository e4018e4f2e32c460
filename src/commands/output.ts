import type { Diagnostic } from "./validate.js";

export type OutputFormat = "human" | "jsonl";

export type OutputStream = { write(chunk: string): unknown };

/**
 * Print failure diagnostics: one JSON object per line on stdout for `jsonl`,
 * otherwise the messages on stderr.
 */
export function writeErrors(
  errors: readonly Diagnostic[],
  format: OutputFormat,
  stdout: OutputStream = process.stdout,
  stderr: OutputStream = process.stderr,
): void {
  for (const error of errors) {
    if (format === "jsonl") {
      stdout.write(JSON.stringify(error) + "\n");
    } else {
      stderr.write(error.message + "\n");
    }
  }
}
