/**
 * Adapter from Node.js decompression streams to web TransformStreams
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

/**
 * The part of a Node.js duplex stream the adapter drives
 */
export interface NodeDecompressor {
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "error", listener: (error: unknown) => void): unknown;
  once(event: "drain" | "end" | "error", listener: () => void): unknown;
  removeListener(event: "drain" | "end" | "error", listener: () => void): unknown;
  write(chunk: Uint8Array): boolean;
  end(): unknown;
}

/**
 * Wrap a Node.js decompressor as a web TransformStream
 *
 * Writes wait for `drain` when the decompressor reports backpressure.
 * Decompressor errors become {@link CompressionError}s on the readable side.
 */
export function fromNodeDecompressor(
  decompressor: NodeDecompressor,
  format: Exclude<CompressionFormat, "none">
): TransformStream<Uint8Array, Uint8Array> {
  let bytesProcessed = 0;
  let failure: CompressionError | undefined;

  const settle = (event: "drain" | "end"): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      const onDone = (): void => {
        decompressor.removeListener("error", onError);
        resolve();
      };
      const onError = (): void => {
        decompressor.removeListener(event, onDone);
        reject(failure);
      };
      decompressor.once(event, onDone);
      decompressor.once("error", onError);
    });

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      decompressor.on("data", (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
      });
      decompressor.on("error", (error: unknown) => {
        failure = CompressionError.fromSystemError(format, "stream", error, bytesProcessed);
        controller.error(failure);
      });
    },

    async transform(chunk) {
      if (failure !== undefined) {
        throw failure;
      }
      bytesProcessed += chunk.length;
      if (!decompressor.write(chunk) && failure === undefined) {
        await settle("drain");
      }
      if (failure !== undefined) {
        throw failure;
      }
    },

    async flush() {
      if (failure !== undefined) {
        throw failure;
      }
      const ended = settle("end");
      decompressor.end();
      await ended;
    },
  });
}
