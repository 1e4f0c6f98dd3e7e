/**
 * FASTQ input helpers
 *
 * @module formats/fastq
 */

export { LINES_PER_RECORD, QUALITY_LINE_OFFSET, qualityLines } from "./quality-lines";
