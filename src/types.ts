/**
 * Core type definitions for quality encoding inference
 *
 * Bounds are modelled as possibly-absent values rather than magic
 * sentinels, so "nothing observed yet" is visible in the types.
 */

import { type } from "arktype";
import { ConfigurationError, type NoEncodingMatchesRangeError, type NoQualityDataError } from "./errors";

/**
 * Names of the quality encodings the range table knows about
 */
export const EncodingName = {
  SANGER: "Sanger",
  ILLUMINA_1_8: "Illumina-1.8",
  SOLEXA: "Solexa",
  ILLUMINA_1_3: "Illumina-1.3",
  ILLUMINA_1_5: "Illumina-1.5",
} as const;

export type EncodingName = (typeof EncodingName)[keyof typeof EncodingName];

/**
 * Inclusive ASCII code range
 */
export interface AsciiRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Encoding name to the ASCII range its typical data occupies
 */
export type EncodingRangeTable = Readonly<Record<EncodingName, AsciiRange>>;

/**
 * ASCII code to number of occurrences within one quality line
 */
export type AsciiHistogram = ReadonlyMap<number, number>;

/**
 * Statistics of a single non-empty quality line
 */
export interface LineBounds extends AsciiRange {
  readonly histogram: AsciiHistogram;
}

/**
 * States of the inference engine
 *
 * - `scanning`: consuming lines, candidates follow the running bounds
 * - `unique`: a single candidate was found, scanning stopped early
 * - `unique-locked`: a single candidate came from the soft heuristic; lines
 *   are still consumed to widen bounds but candidates are frozen
 * - `exhausted`: the line limit was reached or input ended
 * - `error`: no encoding fits the observed bounds
 */
export type EngineState = "scanning" | "unique" | "unique-locked" | "exhausted" | "error";

export type StopReason = "unique" | "line-limit" | "end-of-input" | "no-match" | "no-data";

/**
 * What happened to a single consumed quality line
 */
export type LineOutcome =
  | { readonly kind: "skipped"; readonly reason: "empty"; readonly lineNumber: number }
  | {
      readonly kind: "observed";
      readonly lineNumber: number;
      readonly bounds: AsciiRange;
      readonly boundsChanged: boolean;
      readonly candidatesChanged: boolean;
    };

/**
 * Final answer of an inference run
 */
export interface InferenceResult {
  readonly state: EngineState;
  readonly stopReason: StopReason;
  /** Sorted candidate encodings; empty only when `state` is `error` */
  readonly candidates: readonly EncodingName[];
  /** Running bounds; undefined when no quality character was observed */
  readonly bounds: AsciiRange | undefined;
  /** True when the candidate set was narrowed by the soft heuristic */
  readonly heuristic: boolean;
  readonly linesConsumed: number;
  readonly linesSkipped: number;
  /** Set when `state` is `error` */
  readonly error?: NoEncodingMatchesRangeError | NoQualityDataError;
}

/**
 * Options recognised by the inference engine
 */
export interface InferenceOptions {
  /** Stop after this many quality lines; undefined scans until unique or end of input */
  readonly maxLines?: number;
  /** Keep scanning (with candidates frozen) when uniqueness came only from the soft heuristic */
  readonly disableEarlyStopFromHeuristics?: boolean;
  /** Drop the soft heuristic, keeping range narrowing and the hard rule */
  readonly disableUncertainHeuristics?: boolean;
}

export interface ResolvedInferenceOptions {
  readonly maxLines: number | undefined;
  readonly disableEarlyStopFromHeuristics: boolean;
  readonly disableUncertainHeuristics: boolean;
}

/**
 * Compression formats accepted on input
 */
export type CompressionFormat = "gzip" | "zstd" | "bzip2" | "none";

/**
 * Compression detection result
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  readonly confidence: number;
  readonly magicBytes?: Uint8Array;
  readonly detectionMethod: "extension" | "magic-bytes";
}

// Validation schemas using ArkType

/**
 * Inference options validation schema
 */
export const InferenceOptionsSchema = type({
  "maxLines?": "number.integer>0",
  "disableEarlyStopFromHeuristics?": "boolean",
  "disableUncertainHeuristics?": "boolean",
});

/**
 * Validate inference options and fill in defaults
 *
 * @throws {ConfigurationError} If any option is out of range
 */
export function resolveInferenceOptions(options: InferenceOptions = {}): ResolvedInferenceOptions {
  // Optional keys reject an explicit undefined
  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );
  const validated = InferenceOptionsSchema(defined);
  if (validated instanceof type.errors) {
    throw new ConfigurationError(`Invalid inference options: ${validated.summary}`);
  }

  return {
    maxLines: validated.maxLines,
    disableEarlyStopFromHeuristics: validated.disableEarlyStopFromHeuristics ?? false,
    disableUncertainHeuristics: validated.disableUncertainHeuristics ?? false,
  };
}
