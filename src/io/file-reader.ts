/**
 * Input sources for quality encoding inference
 *
 * Files are streamed through Effect Platform's FileSystem service on the
 * Node.js platform layer; standard input is adapted to a web stream.
 * Either source is decompressed transparently when its first bytes carry
 * a gzip, zstd or bzip2 signature.
 */

import { Readable } from "node:stream";
import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Stream } from "effect";
import { CompressionDetector, createDecompressionStream } from "../compression";
import { FileError } from "../errors";
import type { CompressionFormat } from "../types";
import { peekStream, readLines } from "./stream-utils";

/** Name shown for standard input in diagnostics */
export const STDIN_DISPLAY_NAME = "STDIN";

/**
 * An opened input with its lines ready to be consumed
 */
export interface InputSource {
  /** File path as given, or {@link STDIN_DISPLAY_NAME} */
  readonly displayName: string;
  readonly compression: CompressionFormat;
  /** Decompressed text lines without line endings */
  readonly lines: AsyncIterable<string>;
}

/**
 * Whether a CLI argument names standard input
 */
export function isStdinPath(path: string | undefined): path is undefined | "-" {
  return path === undefined || path === "-";
}

/**
 * Create base file stream using Effect Platform
 */
function createFileStream(
  path: string
): Effect.Effect<ReadableStream<Uint8Array>, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs
      .stat(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

    if (info.type === "Directory") {
      return yield* Effect.fail(
        new FileError(`open operation failed for ${path}: Path points to a directory, not a file`, path, "open")
      );
    }

    const fileStream = fs
      .stream(path)
      .pipe(Stream.mapError((error) => FileError.fromSystemError("read", path, error)));
    return Stream.toReadableStream(fileStream);
  });
}

async function openFileStream(path: string): Promise<ReadableStream<Uint8Array>> {
  const result = await Effect.runPromise(
    createFileStream(path).pipe(Effect.provide(NodeContext.layer), Effect.either)
  );

  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

/**
 * Open a FASTQ input for line-by-line reading
 *
 * @param path File path; undefined or "-" reads standard input
 * @param stdin Readable used for standard input
 * @returns The opened source with decompressed lines
 * @throws {FileError} If the file is missing or unreadable
 *
 * @example
 * ```typescript
 * const input = await openInput('reads.fastq.gz');
 * for await (const line of input.lines) {
 *   // ...
 * }
 * ```
 */
export async function openInput(
  path?: string,
  stdin: Readable = process.stdin
): Promise<InputSource> {
  const filePath = isStdinPath(path) ? undefined : path;
  const raw: ReadableStream<Uint8Array> =
    filePath === undefined ? Readable.toWeb(stdin) : await openFileStream(filePath);

  const { head, stream } = await peekStream(raw);
  const detection = CompressionDetector.detect(filePath, head);

  return {
    displayName: filePath ?? STDIN_DISPLAY_NAME,
    compression: detection.format,
    lines: readLines(stream.pipeThrough(createDecompressionStream(detection.format))),
  };
}
