/**
 * Error types and CLI error reporting
 */

import chalk from "chalk";

export class NbPostError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input is not a well-formed notebook document */
export class ParseError extends NbPostError {}

/** A base64 payload cannot be decoded */
export class DecodeError extends NbPostError {}

/** A file could not be read or written */
export class IOError extends NbPostError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return JSON.stringify(error);
}

/**
 * Prints a failed command in red and marks the process exit code as 1
 */
export function handleCliError(error: unknown, context: string): void {
  console.error(chalk.red(`❌ ${context}:`), toErrorMessage(error));
  process.exitCode = 1;
}
