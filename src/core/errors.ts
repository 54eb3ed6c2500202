/**
 * Error hierarchy. Every error the CLI reports carries the exit code
 * the process terminates with.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'PARSE_ERROR'
  | 'FORMAT_ERROR'
  | 'OUTPUT_ERROR'
  | 'TRANSCRIPTION_ERROR'
  | 'INPUT_ERROR';

export class LrcscribeError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, exitCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends LrcscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', 2, message, options);
  }
}

/** Input transcript is missing, unreadable or does not match the schema. */
export class ParseError extends LrcscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', 3, message, options);
  }
}

/** A line reached the formatter in a state it cannot render. Indicates a grouping bug. */
export class FormatError extends LrcscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FORMAT_ERROR', 4, message, options);
  }
}

export class OutputError extends LrcscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OUTPUT_ERROR', 5, message, options);
  }
}

export type TranscriptionStage = 'upload' | 'request' | 'poll';

export class TranscriptionError extends LrcscribeError {
  readonly stage: TranscriptionStage;

  constructor(stage: TranscriptionStage, message: string, options?: { cause?: unknown }) {
    super('TRANSCRIPTION_ERROR', 6, message, options);
    this.stage = stage;
  }
}

export class InputError extends LrcscribeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT_ERROR', 7, message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Process exit code for a failed command: the error's own code, or 1. */
export function exitCodeFor(error: unknown): number {
  return error instanceof LrcscribeError ? error.exitCode : 1;
}
