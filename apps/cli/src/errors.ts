// Error catalog for wavmix CLI
// Provides typed errors with exact messages and exit codes

import { InvalidModeError, WavError } from "@wavmix/core";

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 2;      // CLI/validation errors
export const EXIT_INPUT = 3;       // Input file errors
export const EXIT_PROCESSING = 4;  // Internal failures
export const EXIT_OUTPUT = 5;      // Output write errors

// Error classes
export class CliError extends Error {
  constructor(
    message: string,
    // eslint-disable-next-line no-unused-vars
    public readonly exitCode: number,
    // eslint-disable-next-line no-unused-vars
    public readonly filename?: string
  ) {
    super(message);
    this.name = 'CliError';
  }
}

// Error factories
export const errors = {
  usage: (message: string) =>
    new CliError(
      `Error: ${message}`,
      EXIT_USAGE
    ),

  invalidMode: (mode: string) =>
    new CliError(
      `Error: '${mode}' is not a valid channel mode (left, right, mid, side)`,
      EXIT_USAGE
    ),

  stdinTwice: () =>
    new CliError(
      `Error: stdin ('-') can only be used for one input`,
      EXIT_USAGE
    ),

  fileNotFound: (file: string) =>
    new CliError(
      `Error: ${file}: file not found`,
      EXIT_INPUT,
      file
    ),

  unreadableFile: (file: string) =>
    new CliError(
      `Error: ${file}: cannot read input`,
      EXIT_INPUT,
      file
    ),

  invalidInput: (file: string, reason: string) =>
    new CliError(
      `Error: ${file}: ${reason}`,
      EXIT_INPUT,
      file
    ),

  processingFailed: (reason: string) =>
    new CliError(
      `Error: processing failed: ${reason}`,
      EXIT_PROCESSING
    ),

  writeFailed: (outFile: string) =>
    new CliError(
      `Error: ${outFile}: failed to write output`,
      EXIT_OUTPUT,
      outFile
    ),
};

// Warning messages (exit 0)
export const warnings = {
  overwrite: (outFile: string) =>
    `Warning: ${outFile} exists; use --force to overwrite`,
};

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a failure while reading or converting `file` to a catalog error.
 */
export function toCliError(error: unknown, file: string): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof InvalidModeError) {
    return errors.invalidMode(error.mode);
  }
  if (error instanceof WavError) {
    return errors.invalidInput(file, error.message);
  }
  const code = errnoCode(error);
  if (code === "ENOENT") {
    return errors.fileNotFound(file);
  }
  if (code !== undefined) {
    return errors.unreadableFile(file);
  }
  return errors.processingFailed(error instanceof Error ? error.message : String(error));
}
