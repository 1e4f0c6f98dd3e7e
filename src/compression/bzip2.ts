/**
 * Streaming bzip2 decompression
 */

import unbzip2Stream from "unbzip2-stream";
import { fromNodeDecompressor } from "./node-stream";

/**
 * Create bzip2 decompression transform stream
 *
 * Output is produced one bzip2 block at a time.
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  return fromNodeDecompressor(unbzip2Stream(), "bzip2");
}

export const Bzip2Decompressor = {
  createStream,
} as const;
