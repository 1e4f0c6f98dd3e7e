/**
 * fastq-guess-encoding
 *
 * Infers the quality-score encoding of FASTQ data (Sanger, Solexa,
 * Illumina 1.3 / 1.5 / 1.8) from the ASCII range of its quality lines.
 *
 * @example
 * ```typescript
 * import { inferEncoding, openInput, qualityLines } from 'fastq-guess-encoding';
 *
 * const input = await openInput('reads.fastq.gz');
 * const result = await inferEncoding(qualityLines(input.lines));
 * console.log(result.candidates, result.bounds);
 * ```
 */

export * from "./errors";
export * from "./types";
export * from "./operations/core/quality";
export { qualityLines, LINES_PER_RECORD, QUALITY_LINE_OFFSET } from "./formats/fastq";
export { CompressionDetector, createDecompressionStream } from "./compression";
export { openInput, isStdinPath, STDIN_DISPLAY_NAME, type InputSource } from "./io/file-reader";
export { peekStream, processBuffer, readLines } from "./io/stream-utils";
export { formatResult, guessEncodingProgram, runGuessEncoding } from "./cli/run";
