/**
 * Compression format detection for FASTQ input
 *
 * Detection uses magic bytes where the first bytes of the input are
 * available and falls back to the file extension otherwise.
 */

import type { CompressionDetection, CompressionFormat } from "../types";
import { CompressionError } from "../errors";

// Magic number constants for compression formats
const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;
const ZSTD_MAGIC_FIRST_BYTE = 0x28;
const ZSTD_MAGIC_SECOND_BYTE = 0xb5;
const ZSTD_MAGIC_THIRD_BYTE = 0x2f;
const ZSTD_MAGIC_FOURTH_BYTE = 0xfd;
// 'BZh'
const BZIP2_MAGIC = [0x42, 0x5a, 0x68];

const COMPRESSION_MAGIC_BYTES = {
  gzip: new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]),
  zstd: new Uint8Array([
    ZSTD_MAGIC_FIRST_BYTE,
    ZSTD_MAGIC_SECOND_BYTE,
    ZSTD_MAGIC_THIRD_BYTE,
    ZSTD_MAGIC_FOURTH_BYTE,
  ]),
  bzip2: new Uint8Array(BZIP2_MAGIC),
} as const;

const COMPRESSION_EXTENSIONS = {
  gzip: [".gz", ".gzip"],
  zstd: [".zst", ".zstd"],
  bzip2: [".bz2", ".bzip2"],
} as const;

const EXTENSION_CONFIDENCE = 0.6;
const MAGIC_BYTES_CONFIDENCE = 1.0;
const UNCOMPRESSED_CONFIDENCE = 0.9;

function startsWith(bytes: Uint8Array, magic: Uint8Array): boolean {
  return bytes.length >= magic.length && magic.every((byte, index) => bytes[index] === byte);
}

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('reads.fastq.gz'); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * console.log(detection.format); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");

    if (COMPRESSION_EXTENSIONS.gzip.some((ext) => normalizedPath.endsWith(ext))) {
      return "gzip";
    }
    if (COMPRESSION_EXTENSIONS.zstd.some((ext) => normalizedPath.endsWith(ext))) {
      return "zstd";
    }
    if (COMPRESSION_EXTENSIONS.bzip2.some((ext) => normalizedPath.endsWith(ext))) {
      return "bzip2";
    }

    return "none";
  }

  /**
   * Detect compression format from the first bytes of the input
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.gzip)) {
      return {
        format: "gzip",
        confidence: MAGIC_BYTES_CONFIDENCE,
        magicBytes: bytes.slice(0, COMPRESSION_MAGIC_BYTES.gzip.length),
        detectionMethod: "magic-bytes",
      };
    }

    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.zstd)) {
      return {
        format: "zstd",
        confidence: MAGIC_BYTES_CONFIDENCE,
        magicBytes: bytes.slice(0, COMPRESSION_MAGIC_BYTES.zstd.length),
        detectionMethod: "magic-bytes",
      };
    }

    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.bzip2)) {
      return {
        format: "bzip2",
        confidence: MAGIC_BYTES_CONFIDENCE,
        magicBytes: bytes.slice(0, COMPRESSION_MAGIC_BYTES.bzip2.length),
        detectionMethod: "magic-bytes",
      };
    }

    return { format: "none", confidence: UNCOMPRESSED_CONFIDENCE, detectionMethod: "magic-bytes" };
  }

  /**
   * Combine extension and magic byte evidence
   *
   * Magic bytes win whenever there are any; an empty input is judged by
   * its extension alone.
   *
   * @param filePath Path of the input, or undefined for stdin
   * @param head First bytes of the input
   */
  static detect(filePath: string | undefined, head: Uint8Array): CompressionDetection {
    if (head.length > 0 || filePath === undefined) {
      return CompressionDetector.fromMagicBytes(head);
    }

    return {
      format: CompressionDetector.fromExtension(filePath),
      confidence: EXTENSION_CONFIDENCE,
      detectionMethod: "extension",
    };
  }
}
