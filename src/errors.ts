/**
 * Error handling for quality encoding inference
 *
 * Every failure path carries a stable `code` and maps to its own process
 * exit status through {@link exitCodeFor}.
 */

import type { CompressionFormat } from "./types";

/**
 * Base error class for all guess-encoding errors
 */
export class GuessEncodingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "GuessEncodingError";
  }

  /**
   * Create a user-facing message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (quality line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * The accumulated ASCII bound is not contained in any known encoding range
 */
export class NoEncodingMatchesRangeError extends GuessEncodingError {
  constructor(
    public readonly min: number,
    public readonly max: number,
    lineNumber?: number
  ) {
    super(
      `no encodings for range: (${min}, ${max})`,
      "NO_ENCODING_MATCHES_RANGE",
      lineNumber,
      `Observed characters '${String.fromCharCode(min)}'..'${String.fromCharCode(max)}'`
    );
    this.name = "NoEncodingMatchesRangeError";
  }
}

/**
 * Input ended before a single quality character was observed
 */
export class NoQualityDataError extends GuessEncodingError {
  constructor(public readonly linesConsumed: number) {
    super(
      linesConsumed === 0
        ? "no quality lines found in input"
        : `no quality characters found in ${linesConsumed} quality line(s)`,
      "NO_QUALITY_DATA"
    );
    this.name = "NoQualityDataError";
  }
}

/**
 * More than one input source was requested
 */
export class MultipleInputsError extends GuessEncodingError {
  constructor(public readonly inputs: readonly string[]) {
    super(
      "Only a single input file is supported.",
      "MULTIPLE_INPUTS",
      undefined,
      `Received: ${inputs.join(", ")}`
    );
    this.name = "MultipleInputsError";
  }
}

/**
 * Invalid inference or CLI options
 */
export class ConfigurationError extends GuessEncodingError {
  constructor(
    message: string,
    public readonly option?: string
  ) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/**
 * The engine was driven after it had already stopped
 */
export class InferenceStateError extends GuessEncodingError {
  constructor(public readonly state: string) {
    super(`cannot consume quality lines in state '${state}'`, "INFERENCE_STATE_ERROR");
    this.name = "InferenceStateError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends GuessEncodingError {
  constructor(
    message: string,
    public readonly format: CompressionFormat,
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors for the input source
 */
export class FileError extends GuessEncodingError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Stream processing errors while reading input
 */
export class StreamError extends GuessEncodingError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends GuessEncodingError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Process exit statuses, one per failure kind
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  NO_ENCODING_MATCHES_RANGE: 1,
  MULTIPLE_INPUTS: 2,
  INPUT_ERROR: 3,
  NO_QUALITY_DATA: 4,
  CONFIGURATION_ERROR: 5,
  UNEXPECTED: 70,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error to the exit status the CLI reports for it
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof NoEncodingMatchesRangeError) return EXIT_CODES.NO_ENCODING_MATCHES_RANGE;
  if (error instanceof MultipleInputsError) return EXIT_CODES.MULTIPLE_INPUTS;
  if (
    error instanceof FileError ||
    error instanceof CompressionError ||
    error instanceof StreamError ||
    error instanceof BufferError
  ) {
    return EXIT_CODES.INPUT_ERROR;
  }
  if (error instanceof NoQualityDataError) return EXIT_CODES.NO_QUALITY_DATA;
  if (error instanceof ConfigurationError) return EXIT_CODES.CONFIGURATION_ERROR;
  return EXIT_CODES.UNEXPECTED;
}
