/**
 * Quality encoding inference
 *
 * @module operations/core/quality
 *
 * @example Range lookup
 * ```typescript
 * import { encodingsMatching } from '@/operations/core/quality';
 *
 * encodingsMatching(35, 73); // ['Illumina-1.8', 'Sanger']
 * ```
 *
 * @example Inference over quality lines
 * ```typescript
 * import { inferEncoding } from '@/operations/core/quality';
 *
 * const result = await inferEncoding(lines, { maxLines: 5000 });
 * ```
 */

// ============================================================================
// RANGE TABLE
// ============================================================================

export {
  compareEncodingNames,
  describeEncoding,
  ENCODING_RANGES,
  encodingOffset,
  encodingsMatching,
  getSupportedEncodings,
  isEncodingName,
} from "./encoding-info";

// ============================================================================
// LINE STATISTICS
// ============================================================================

export { computeLineBounds, mostFrequentCodes } from "./statistics";

// ============================================================================
// HEURISTICS
// ============================================================================

export type { DisambiguationResult } from "./heuristics";
export { AMBIGUOUS_PAIR, disambiguate, TOP_N_FREQUENT } from "./heuristics";

// ============================================================================
// INFERENCE ENGINE
// ============================================================================

export { EncodingInferenceEngine, inferEncoding } from "./detection";
