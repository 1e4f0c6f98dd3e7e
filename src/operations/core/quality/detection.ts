/**
 * Quality encoding inference over a stream of quality lines
 *
 * The engine keeps running ASCII bounds across every line it consumes and
 * narrows the candidate encodings whenever those bounds widen. It is a
 * small state machine:
 *
 * ```
 * scanning ──unique──────────────► unique
 *    │  └────unique by heuristic──► unique-locked ──end of input──► (final)
 *    ├──line limit / end of input─► exhausted
 *    └──no encoding fits──────────► error
 * ```
 *
 * `unique-locked` is only entered when early stopping on the soft heuristic
 * is disabled: lines keep widening the bounds but the candidate set stays
 * frozen, so later lines can neither override the guess nor raise a
 * no-match error.
 */

import {
  InferenceStateError,
  NoEncodingMatchesRangeError,
  NoQualityDataError,
} from "../../../errors";
import {
  resolveInferenceOptions,
  type AsciiRange,
  type EncodingName,
  type EncodingRangeTable,
  type EngineState,
  type InferenceOptions,
  type InferenceResult,
  type LineBounds,
  type LineOutcome,
  type ResolvedInferenceOptions,
  type StopReason,
} from "../../../types";
import { ENCODING_RANGES, encodingsMatching } from "./encoding-info";
import { disambiguate } from "./heuristics";
import { computeLineBounds } from "./statistics";

const STOPPED_STATES: ReadonlySet<EngineState> = new Set(["unique", "exhausted", "error"]);

function sameCandidates(a: readonly EncodingName[], b: readonly EncodingName[]): boolean {
  return a.length === b.length && a.every((name, index) => b[index] === name);
}

/**
 * Incremental quality encoding inference engine
 *
 * @example
 * ```typescript
 * const engine = new EncodingInferenceEngine({ maxLines: 1000 });
 * for (const line of qualityLines) {
 *   engine.consume(line);
 *   if (engine.stopped) break;
 * }
 * const result = engine.finish();
 * console.log(result.candidates, result.bounds);
 * ```
 */
export class EncodingInferenceEngine {
  private readonly options: ResolvedInferenceOptions;
  private currentState: EngineState = "scanning";
  private stopReason: StopReason | undefined;
  private runningBounds: AsciiRange | undefined;
  private currentCandidates: readonly EncodingName[] = [];
  private heuristicUsed = false;
  private consumed = 0;
  private skipped = 0;
  private failure: NoEncodingMatchesRangeError | NoQualityDataError | undefined;

  constructor(
    options: InferenceOptions = {},
    private readonly table: EncodingRangeTable = ENCODING_RANGES
  ) {
    this.options = resolveInferenceOptions(options);
  }

  get state(): EngineState {
    return this.currentState;
  }

  /** True once no further lines may be consumed */
  get stopped(): boolean {
    return STOPPED_STATES.has(this.currentState);
  }

  get candidates(): readonly EncodingName[] {
    return this.currentCandidates;
  }

  get bounds(): AsciiRange | undefined {
    return this.runningBounds;
  }

  get heuristic(): boolean {
    return this.heuristicUsed;
  }

  get linesConsumed(): number {
    return this.consumed;
  }

  get linesSkipped(): number {
    return this.skipped;
  }

  /**
   * Consume one quality line
   *
   * Empty lines count towards the line limit but leave the bounds alone.
   *
   * @throws {InferenceStateError} If the engine has already stopped
   */
  consume(line: string): LineOutcome {
    if (this.stopped) {
      throw new InferenceStateError(this.currentState);
    }

    this.consumed++;
    const lineNumber = this.consumed;
    const lineBounds = computeLineBounds(line);

    let outcome: LineOutcome;
    if (lineBounds === undefined) {
      this.skipped++;
      outcome = { kind: "skipped", reason: "empty", lineNumber };
    } else {
      outcome = this.observe(lineBounds, lineNumber);
    }

    const { maxLines } = this.options;
    if (!this.stopped && maxLines !== undefined && this.consumed >= maxLines) {
      this.end("line-limit");
    }

    return outcome;
  }

  /**
   * Close the run and report the answer
   *
   * Input that ends while scanning leaves the engine `exhausted`; a locked
   * heuristic answer stays `unique-locked`. Calling it again returns the
   * same result.
   */
  finish(): InferenceResult {
    if (!this.stopped) {
      this.end("end-of-input");
    }

    return {
      state: this.currentState,
      stopReason: this.stopReason ?? "end-of-input",
      candidates: this.currentCandidates,
      bounds: this.runningBounds,
      heuristic: this.heuristicUsed,
      linesConsumed: this.consumed,
      linesSkipped: this.skipped,
      ...(this.failure !== undefined && { error: this.failure }),
    };
  }

  private observe(lineBounds: LineBounds, lineNumber: number): LineOutcome {
    const previous = this.runningBounds;
    const lineRange: AsciiRange = { min: lineBounds.min, max: lineBounds.max };

    const boundsChanged =
      previous === undefined || lineBounds.min < previous.min || lineBounds.max > previous.max;

    if (!boundsChanged) {
      return { kind: "observed", lineNumber, bounds: lineRange, boundsChanged, candidatesChanged: false };
    }

    const bounds: AsciiRange =
      previous === undefined
        ? lineRange
        : { min: Math.min(previous.min, lineBounds.min), max: Math.max(previous.max, lineBounds.max) };
    this.runningBounds = bounds;

    if (this.currentState === "unique-locked") {
      return { kind: "observed", lineNumber, bounds: lineRange, boundsChanged, candidatesChanged: false };
    }

    const before = this.currentCandidates;
    const narrowed = disambiguate(
      encodingsMatching(bounds.min, bounds.max, this.table),
      lineBounds.histogram,
      !this.options.disableUncertainHeuristics
    );
    this.currentCandidates = narrowed.candidates;
    this.heuristicUsed = narrowed.heuristic;

    if (narrowed.candidates.length === 0) {
      this.failure = new NoEncodingMatchesRangeError(bounds.min, bounds.max, lineNumber);
      this.transition("error", "no-match");
    } else if (narrowed.candidates.length === 1 && this.options.maxLines === undefined) {
      if (narrowed.heuristic && this.options.disableEarlyStopFromHeuristics) {
        this.currentState = "unique-locked";
      } else {
        this.transition("unique", "unique");
      }
    }

    return {
      kind: "observed",
      lineNumber,
      bounds: lineRange,
      boundsChanged,
      candidatesChanged: !sameCandidates(before, narrowed.candidates),
    };
  }

  private end(reason: "line-limit" | "end-of-input"): void {
    if (this.runningBounds === undefined) {
      this.failure = new NoQualityDataError(this.consumed);
      this.transition("error", "no-data");
      return;
    }

    if (this.currentState === "unique-locked") {
      this.stopReason = reason;
      return;
    }

    this.transition("exhausted", reason);
  }

  private transition(state: EngineState, reason: StopReason): void {
    this.currentState = state;
    this.stopReason = reason;
  }
}

/**
 * Run an inference engine over a sequence of quality lines
 *
 * Iteration stops as soon as the engine stops, so an async source is
 * never read further than needed.
 *
 * @param lines - Quality strings, one per read, without trailing newlines
 * @param options - Inference options
 * @param onLine - Called with the outcome of every consumed line
 * @returns The final inference result; `state` is `error` when no encoding fits
 *
 * @example
 * ```typescript
 * const result = await inferEncoding(['IIIII+++', '5555##']);
 * console.log(result.candidates); // ['Illumina-1.8', 'Sanger']
 * ```
 */
export async function inferEncoding(
  lines: Iterable<string> | AsyncIterable<string>,
  options: InferenceOptions = {},
  onLine?: (outcome: LineOutcome) => void
): Promise<InferenceResult> {
  const engine = new EncodingInferenceEngine(options);

  for await (const line of lines) {
    const outcome = engine.consume(line);
    onLine?.(outcome);
    if (engine.stopped) break;
  }

  return engine.finish();
}
