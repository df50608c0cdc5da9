import { CofferError } from "@coffer/core/errors";

/** Where command output goes. Tests capture it instead of the terminal. */
export interface CliIo {
  out(chunk: string | Uint8Array): void;
  err(text: string): void;
}

export const processIo: CliIo = {
  out: (chunk) => {
    process.stdout.write(chunk);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

export type OutputOptions = {
  json?: boolean;
};

/** Print `data` as JSON, or the text rendering of it. */
export function printResult(
  io: CliIo,
  options: OutputOptions,
  data: object,
  text: string,
): void {
  io.out(options.json ? JSON.stringify(data, null, 2) + "\n" : text + "\n");
}

export function formatError(err: unknown, options: OutputOptions): string {
  if (options.json && err instanceof CofferError) {
    return JSON.stringify(err.toJSON()) + "\n";
  }
  const message = err instanceof Error ? err.message : String(err);
  return `Error: ${message}\n`;
}
