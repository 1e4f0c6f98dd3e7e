/**
 * Histogram heuristics separating Illumina 1.3 from Illumina 1.5
 *
 * Both encodings are Phred+64 and their typical ranges overlap almost
 * entirely. Illumina 1.5 leaves Q0 and Q1 ('@', 'A') unused and writes Q2
 * ('B') as the read segment quality control indicator, which tends to
 * dominate the tail of low-quality reads.
 */

import { EncodingName, type AsciiHistogram } from "../../../types";
import { encodingOffset } from "./encoding-info";
import { mostFrequentCodes } from "./statistics";

/**
 * How many of a line's most frequent codes are searched for the Q2 indicator
 */
export const TOP_N_FREQUENT = 4;

/**
 * Encoding pair the heuristics disambiguate
 */
export const AMBIGUOUS_PAIR = {
  lower: EncodingName.ILLUMINA_1_3,
  higher: EncodingName.ILLUMINA_1_5,
} as const;

/** Phred scores never written by the higher-floor encoding */
const UNUSED_SCORES = [0, 1] as const;
/** Phred score used as the quality control indicator */
const INDICATOR_SCORE = 2;

export interface DisambiguationResult {
  readonly candidates: readonly EncodingName[];
  /** True when the soft rule collapsed the set */
  readonly heuristic: boolean;
}

/**
 * Narrow an Illumina 1.3/1.5 ambiguity using one line's histogram
 *
 * The hard rule removes Illumina 1.5 when codes for Q0 or Q1 occur at
 * all. The soft rule, only with `allowUncertain`, collapses the set to
 * Illumina 1.5 when the code for Q2 is among the {@link TOP_N_FREQUENT}
 * most frequent codes.
 *
 * Candidate sets without both members of the pair are returned unchanged.
 *
 * @example
 * ```typescript
 * const histogram = new Map([[66, 4], [103, 2], [104, 2]]); // 'BBBBgghh'
 * disambiguate(['Illumina-1.3', 'Illumina-1.5', 'Solexa'], histogram, true);
 * // { candidates: ['Illumina-1.5'], heuristic: true }
 * ```
 */
export function disambiguate(
  candidates: readonly EncodingName[],
  histogram: AsciiHistogram,
  allowUncertain: boolean
): DisambiguationResult {
  if (!candidates.includes(AMBIGUOUS_PAIR.lower) || !candidates.includes(AMBIGUOUS_PAIR.higher)) {
    return { candidates, heuristic: false };
  }

  const offset = encodingOffset(AMBIGUOUS_PAIR.higher);

  const hasUnusedScores = UNUSED_SCORES.some((score) => (histogram.get(offset + score) ?? 0) > 0);
  if (hasUnusedScores) {
    return {
      candidates: candidates.filter((name) => name !== AMBIGUOUS_PAIR.higher),
      heuristic: false,
    };
  }

  if (allowUncertain) {
    const topCodes = mostFrequentCodes(histogram, TOP_N_FREQUENT);
    if (topCodes.includes(offset + INDICATOR_SCORE)) {
      return { candidates: [AMBIGUOUS_PAIR.higher], heuristic: true };
    }
  }

  return { candidates, heuristic: false };
}
