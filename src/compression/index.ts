/**
 * Compression module for FASTQ input
 *
 * @example Auto-detection and decompression
 * ```typescript
 * import { CompressionDetector, createDecompressionStream } from '@/compression';
 *
 * const detection = CompressionDetector.detect('reads.fastq.gz', head);
 * const plain = stream.pipeThrough(createDecompressionStream(detection.format));
 * ```
 */

export { CompressionDetector } from "./detector";
export { GzipDecompressor } from "./gzip";
export { ZstdDecompressor } from "./zstd";
export { Bzip2Decompressor } from "./bzip2";
export { CompressionError } from "../errors";
export type { CompressionDetection, CompressionFormat } from "../types";

import type { CompressionFormat } from "../types";
import { createStream as createBzip2Stream } from "./bzip2";
import { createStream as createGzipStream } from "./gzip";
import { createStream as createZstdStream } from "./zstd";

/**
 * Create a passthrough stream that forwards data unchanged
 */
function createPassthroughStream(): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}

/**
 * Create a decompression transform stream for a format
 *
 * @param format Compression format of the incoming bytes
 * @returns TransformStream producing uncompressed bytes
 */
export function createDecompressionStream(
  format: CompressionFormat
): TransformStream<Uint8Array, Uint8Array> {
  switch (format) {
    case "gzip":
      return createGzipStream();
    case "zstd":
      return createZstdStream();
    case "bzip2":
      return createBzip2Stream();
    case "none":
      return createPassthroughStream();
  }
}
