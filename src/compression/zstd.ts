/**
 * Zstandard decompression
 *
 * Streams through Node's native zstd support when the runtime has it.
 * Otherwise the @hpcc-js/wasm-zstd WASM module decompresses one frame at a
 * time: input is buffered only until the current frame is complete, so
 * multi-frame files (`cat a.zst b.zst`) work and output starts before the
 * input ends.
 */

import { Transform } from "node:stream";
import * as zlib from "node:zlib";
import { Zstd } from "@hpcc-js/wasm-zstd";
import { CompressionError } from "../errors";
import { fromNodeDecompressor } from "./node-stream";

const ZSTD_MAGIC_NUMBER = new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]);
const ZSTD_FRAME_MAGIC = 0xfd2fb528;
const SKIPPABLE_FRAME_MAGIC = 0x184d2a50;
const SKIPPABLE_FRAME_MASK = 0xfffffff0;
const BLOCK_HEADER_SIZE = 3;
const CHECKSUM_SIZE = 4;
const RESERVED_BLOCK_TYPE = 3;
const RLE_BLOCK_TYPE = 1;

let zstdInstance: Promise<Zstd> | undefined;

function loadZstd(): Promise<Zstd> {
  zstdInstance ??= Zstd.load();
  return zstdInstance;
}

function validateZstdFormat(compressed: Uint8Array): void {
  const matches =
    compressed.length >= ZSTD_MAGIC_NUMBER.length &&
    ZSTD_MAGIC_NUMBER.every((byte, index) => compressed[index] === byte);

  if (!matches) {
    throw new CompressionError(
      "Invalid zstd magic bytes - file may not be zstd compressed",
      "zstd",
      "decompress",
      0
    );
  }
}

/**
 * A complete frame found in a buffer
 */
export interface ZstdFrame {
  readonly length: number;
  /** Skippable frames carry user data, not compressed content */
  readonly skippable: boolean;
}

/**
 * Measure the frame starting at `offset`
 *
 * Walks the frame header and block headers without decompressing.
 *
 * @returns The frame, or undefined when the buffer ends inside it
 * @throws {CompressionError} If the bytes at `offset` are not a zstd frame
 */
export function readFrame(data: Uint8Array, offset: number): ZstdFrame | undefined {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const available = data.byteLength - offset;
  if (available < 4) return undefined;

  const magic = view.getUint32(offset, true);
  if ((magic & SKIPPABLE_FRAME_MASK) >>> 0 === SKIPPABLE_FRAME_MAGIC) {
    if (available < 8) return undefined;
    const length = 8 + view.getUint32(offset + 4, true);
    return available >= length ? { length, skippable: true } : undefined;
  }
  if (magic !== ZSTD_FRAME_MAGIC) {
    throw new CompressionError(`Invalid zstd frame at byte ${offset}`, "zstd", "decompress", offset);
  }
  if (available < 5) return undefined;

  const descriptor = view.getUint8(offset + 4);
  const contentSizeFlag = descriptor >> 6;
  const singleSegment = (descriptor & 0x20) !== 0;
  const hasChecksum = (descriptor & 0x04) !== 0;
  const dictionaryIdFlag = descriptor & 0x03;

  const dictionaryIdSize = dictionaryIdFlag === 3 ? 4 : dictionaryIdFlag;
  const contentSizeSize = contentSizeFlag === 0 ? (singleSegment ? 1 : 0) : 1 << contentSizeFlag;
  const windowDescriptorSize = singleSegment ? 0 : 1;

  let position = offset + 5 + windowDescriptorSize + dictionaryIdSize + contentSizeSize;
  for (;;) {
    if (data.byteLength - position < BLOCK_HEADER_SIZE) return undefined;
    const header =
      view.getUint8(position) | (view.getUint8(position + 1) << 8) | (view.getUint8(position + 2) << 16);
    const lastBlock = (header & 1) !== 0;
    const blockType = (header >> 1) & 0x03;
    if (blockType === RESERVED_BLOCK_TYPE) {
      throw new CompressionError(`Reserved zstd block type at byte ${position}`, "zstd", "decompress", position);
    }
    position += BLOCK_HEADER_SIZE + (blockType === RLE_BLOCK_TYPE ? 1 : header >>> 3);
    if (lastBlock) break;
  }

  if (hasChecksum) position += CHECKSUM_SIZE;
  return position <= data.byteLength ? { length: position - offset, skippable: false } : undefined;
}

/**
 * Split a buffer into its complete data frames
 *
 * @returns The data frames and the number of bytes they (and any skippable
 * frames between them) cover
 */
export function splitFrames(data: Uint8Array): { frames: Uint8Array[]; consumed: number } {
  const frames: Uint8Array[] = [];
  let offset = 0;

  for (;;) {
    const frame = readFrame(data, offset);
    if (frame === undefined) break;
    if (!frame.skippable) {
      frames.push(data.subarray(offset, offset + frame.length));
    }
    offset += frame.length;
  }

  return { frames, consumed: offset };
}

async function decompressFrame(frame: Uint8Array, bytesProcessed: number): Promise<Uint8Array> {
  const zstd = await loadZstd();
  try {
    return zstd.decompress(frame);
  } catch (error) {
    throw CompressionError.fromSystemError("zstd", "decompress", error, bytesProcessed);
  }
}

function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const merged = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    merged.set(part, offset);
    offset += part.length;
  }
  return merged;
}

/**
 * Decompress a complete Zstandard buffer of one or more frames
 *
 * @throws {CompressionError} If the data is not valid zstd or ends inside a frame
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  validateZstdFormat(compressed);

  const { frames, consumed } = splitFrames(compressed);
  if (consumed !== compressed.length) {
    throw new CompressionError(
      "zstd data ends inside a frame - file appears to be truncated",
      "zstd",
      "decompress",
      consumed
    );
  }

  const parts: Uint8Array[] = [];
  for (const frame of frames) {
    parts.push(await decompressFrame(frame, consumed));
  }
  return concatBytes(parts);
}

/**
 * Create a frame-by-frame decompression stream on the WASM module
 */
export function createWasmStream(): TransformStream<Uint8Array, Uint8Array> {
  let pending: Uint8Array = new Uint8Array(0);
  let bytesProcessed = 0;

  return new TransformStream<Uint8Array, Uint8Array>({
    async transform(chunk, controller) {
      bytesProcessed += chunk.length;
      pending = pending.length === 0 ? chunk : concatBytes([pending, chunk]);

      const { frames, consumed } = splitFrames(pending);
      for (const frame of frames) {
        controller.enqueue(await decompressFrame(frame, bytesProcessed));
      }
      pending = pending.slice(consumed);
    },

    flush() {
      if (pending.length > 0) {
        throw new CompressionError(
          "zstd data ends inside a frame - file appears to be truncated",
          "zstd",
          "stream",
          bytesProcessed
        );
      }
    },
  });
}

/**
 * Node's native zstd decompressor, where the runtime provides one
 */
function createNativeDecompressor(): Transform | undefined {
  const factory: unknown = Reflect.get(zlib, "createZstdDecompress");
  if (typeof factory !== "function") {
    return undefined;
  }
  const decompressor: unknown = Reflect.apply(factory, zlib, []);
  return decompressor instanceof Transform ? decompressor : undefined;
}

/**
 * Create Zstd decompression transform stream
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  const native = createNativeDecompressor();
  return native !== undefined ? fromNodeDecompressor(native, "zstd") : createWasmStream();
}

export const ZstdDecompressor = {
  decompress,
  createStream,
  createWasmStream,
} as const;
