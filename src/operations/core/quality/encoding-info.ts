/**
 * Quality encoding range table
 *
 * Each encoding is described by the inclusive ASCII range its typical data
 * occupies. The theoretical maximum for all encodings is 126 (`~`); the
 * upper limits below are for "typical" data only.
 */

import { EncodingName, type AsciiRange, type EncodingRangeTable } from "../../../types";

/**
 * Known encodings and their ASCII ranges
 */
export const ENCODING_RANGES: EncodingRangeTable = Object.freeze({
  [EncodingName.SANGER]: Object.freeze({ min: 33, max: 73 }),
  [EncodingName.ILLUMINA_1_8]: Object.freeze({ min: 33, max: 74 }),
  [EncodingName.SOLEXA]: Object.freeze({ min: 59, max: 104 }),
  [EncodingName.ILLUMINA_1_3]: Object.freeze({ min: 64, max: 104 }),
  [EncodingName.ILLUMINA_1_5]: Object.freeze({ min: 66, max: 105 }),
});

const ENCODING_DETAILS: Record<EncodingName, { readonly offset: number; readonly description: string }> = {
  [EncodingName.SANGER]: { offset: 33, description: "Phred+33, Q0-Q40" },
  [EncodingName.ILLUMINA_1_8]: { offset: 33, description: "Phred+33, Q0-Q41" },
  [EncodingName.SOLEXA]: { offset: 64, description: "Solexa+64, Q-5-Q40" },
  [EncodingName.ILLUMINA_1_3]: { offset: 64, description: "Phred+64, Q0-Q40" },
  [EncodingName.ILLUMINA_1_5]: {
    offset: 64,
    description: "Phred+64, Q3-Q41 (Q2 'B' marks read segment quality control)",
  },
};

/**
 * Order-independent comparison used for every candidate list we emit
 */
export function compareEncodingNames(a: EncodingName, b: EncodingName): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Encodings whose range contains `[min, max]`
 *
 * @returns Matching names sorted for reproducible output
 *
 * @example
 * ```typescript
 * encodingsMatching(68, 89); // ['Illumina-1.3', 'Illumina-1.5', 'Solexa']
 * encodingsMatching(10, 120); // []
 * ```
 */
export function encodingsMatching(
  min: number,
  max: number,
  table: EncodingRangeTable = ENCODING_RANGES
): EncodingName[] {
  return getSupportedEncodings().filter((name) => {
    const range: AsciiRange = table[name];
    return range.min <= min && range.max >= max;
  });
}

/**
 * List all known encodings, sorted
 */
export function getSupportedEncodings(): EncodingName[] {
  return Object.values(EncodingName).sort(compareEncodingNames);
}

/**
 * Check if a string names a known encoding
 */
export function isEncodingName(value: string): value is EncodingName {
  return Object.values(EncodingName).some((name) => name === value);
}

/**
 * Human-readable description of an encoding for diagnostics
 *
 * @example
 * ```typescript
 * describeEncoding('Sanger'); // 'Sanger: Phred+33, Q0-Q40, ASCII 33-73'
 * ```
 */
export function describeEncoding(name: EncodingName, table: EncodingRangeTable = ENCODING_RANGES): string {
  const { description } = ENCODING_DETAILS[name];
  const range = table[name];
  return `${name}: ${description}, ASCII ${range.min}-${range.max}`;
}

/**
 * ASCII offset applied to Phred scores by an encoding
 */
export function encodingOffset(name: EncodingName): number {
  return ENCODING_DETAILS[name].offset;
}
