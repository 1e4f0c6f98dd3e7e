/**
 * Quality line extraction from line-oriented FASTQ input
 *
 * Records are assumed to be four lines each (header, sequence, separator,
 * quality); multi-line sequence records are not reassembled.
 */

/** Lines per FASTQ record */
export const LINES_PER_RECORD = 4;

/** 0-based position of the quality line within a record */
export const QUALITY_LINE_OFFSET = 3;

/**
 * Yield the quality line of every FASTQ record
 *
 * Takes every fourth line starting at 0-based index 3 and strips trailing
 * whitespace, so `\r` from CRLF files never reaches the bounds.
 *
 * @param lines - Raw FASTQ lines in file order
 * @yields Quality strings, one per record
 *
 * @example
 * ```typescript
 * const lines = ['@r1', 'ACGT', '+', 'IIII', '@r2', 'ACGT', '+', '####'];
 * for await (const quality of qualityLines(lines)) {
 *   console.log(quality); // 'IIII', then '####'
 * }
 * ```
 */
export async function* qualityLines(
  lines: Iterable<string> | AsyncIterable<string>
): AsyncGenerator<string> {
  let index = 0;

  for await (const line of lines) {
    if (index % LINES_PER_RECORD === QUALITY_LINE_OFFSET) {
      yield line.trimEnd();
    }
    index++;
  }
}
