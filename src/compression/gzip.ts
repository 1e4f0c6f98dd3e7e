/**
 * Streaming gzip decompression on Node's zlib
 */

import { createGunzip } from "node:zlib";
import { fromNodeDecompressor } from "./node-stream";

/**
 * Create gzip decompression transform stream
 *
 * Concatenated gzip members (as written by `cat a.gz b.gz`) are
 * decompressed in sequence.
 *
 * @returns TransformStream for gzip decompression
 *
 * @example
 * ```typescript
 * const lines = readLines(compressedStream.pipeThrough(createStream()));
 * ```
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  return fromNodeDecompressor(createGunzip(), "gzip");
}

export const GzipDecompressor = {
  createStream,
} as const;
