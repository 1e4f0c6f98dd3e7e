/**
 * Stream processing utilities for line-oriented text input
 */

import { BufferError, GuessEncodingError, StreamError } from "../errors";

// Constants for stream processing
const MAX_LINE_LENGTH = 10_000_000; // long-read quality lines can run to megabases

/**
 * Split a text buffer into complete lines and a trailing remainder
 *
 * Handles `\n` and `\r\n` endings; a `\r` at the very end of the buffer is
 * kept in the remainder until the next chunk shows whether `\n` follows.
 *
 * @throws {BufferError} If a line or remainder exceeds the maximum length
 */
export function processBuffer(buffer: string): { lines: string[]; remainder: string } {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer[newline - 1] === "\r" ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);
    checkLineLength(line.length);
    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  const remainder = buffer.slice(lineStart);
  checkLineLength(remainder.length);

  return { lines, remainder };
}

function checkLineLength(length: number): void {
  if (length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering so complete lines are yielded even when chunks
 * don't align with line boundaries. Empty lines are preserved; a final
 * line without a trailing newline is yielded as well.
 *
 * @param stream Stream of binary data to process
 * @yields Complete lines of text without their line endings
 * @throws {StreamError} If reading the stream fails
 * @throws {BufferError} If a line is too long
 *
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        if (error instanceof GuessEncodingError) {
          throw error;
        }
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          totalBytesProcessed
        );
      });

      if (chunk.done) {
        buffer += decoder.decode();
        break;
      }

      totalBytesProcessed += chunk.value.length;
      const result = processBuffer(buffer + decoder.decode(chunk.value, { stream: true }));
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }

    if (buffer.length > 0) {
      yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
    }
    settled = true;
  } finally {
    if (!settled) {
      // Consumer stopped early; stop the underlying source as well
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Read the first chunk of a stream without losing it
 *
 * @returns The first chunk (empty for an empty stream) and a stream that
 * still yields every byte, starting with that chunk
 */
export async function peekStream(
  stream: ReadableStream<Uint8Array>
): Promise<{ head: Uint8Array; stream: ReadableStream<Uint8Array> }> {
  const reader = stream.getReader();
  const first = await reader.read();
  const head = first.done ? new Uint8Array(0) : first.value;

  const replay = new ReadableStream<Uint8Array>({
    start(controller) {
      if (head.length > 0) {
        controller.enqueue(head);
      }
      if (first.done) {
        controller.close();
      }
    },

    async pull(controller) {
      const next = await reader.read();
      if (next.done) {
        controller.close();
      } else {
        controller.enqueue(next.value);
      }
    },

    cancel(reason) {
      return reader.cancel(reason);
    },
  });

  return { head, stream: replay };
}
