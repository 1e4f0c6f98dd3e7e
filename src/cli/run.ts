/**
 * Command-line driver: input selection, inference and reporting
 */

import type { Readable } from "node:stream";
import { Effect, Either } from "effect";
import {
  ConfigurationError,
  EXIT_CODES,
  exitCodeFor,
  GuessEncodingError,
  MultipleInputsError,
  type ExitCode,
} from "../errors";
import { qualityLines } from "../formats/fastq";
import { openInput } from "../io/file-reader";
import { logError, logInfo, logWarn, styleKV } from "../logger";
import { inferEncoding } from "../operations/core/quality";
import { resolveInferenceOptions, type InferenceOptions, type InferenceResult, type LineOutcome } from "../types";

/**
 * Format a successful result as `<names>\t<min>\t<max>`
 *
 * @example
 * ```typescript
 * formatResult(result); // 'Illumina-1.8,Sanger\t35\t73'
 * ```
 */
export function formatResult(result: InferenceResult): string {
  const min = result.bounds?.min ?? "";
  const max = result.bounds?.max ?? "";
  return `${result.candidates.join(",")}\t${min}\t${max}`;
}

function toGuessEncodingError(error: unknown): GuessEncodingError {
  if (error instanceof GuessEncodingError) {
    return error;
  }
  return new GuessEncodingError(error instanceof Error ? error.message : String(error), "UNEXPECTED");
}

async function* announceSource(lines: AsyncIterable<string>, displayName: string): AsyncGenerator<string> {
  let announced = false;
  for await (const line of lines) {
    if (!announced) {
      logInfo(`# reading qualities from ${displayName}`);
      announced = true;
    }
    yield line;
  }
}

function reportOutcome(outcome: LineOutcome): void {
  if (outcome.kind === "skipped") {
    logWarn(`skipping empty quality line (${styleKV("quality line", outcome.lineNumber)})`);
  }
}

/**
 * Build the inference program for one invocation
 *
 * Fails with the error that decides the exit status.
 */
export function guessEncodingProgram(
  inputs: readonly string[],
  options: InferenceOptions,
  stdin?: Readable
): Effect.Effect<InferenceResult, GuessEncodingError> {
  return Effect.gen(function* () {
    if (inputs.length > 1) {
      return yield* Effect.fail(new MultipleInputsError(inputs));
    }

    const resolved = yield* Effect.try({
      try: () => resolveInferenceOptions(options),
      catch: (error) =>
        error instanceof ConfigurationError ? error : new ConfigurationError(String(error)),
    });

    const input = yield* Effect.tryPromise({
      try: () => openInput(inputs[0], stdin),
      catch: toGuessEncodingError,
    });

    const result = yield* Effect.tryPromise({
      try: () =>
        inferEncoding(
          announceSource(qualityLines(input.lines), input.displayName),
          resolved,
          reportOutcome
        ),
      catch: toGuessEncodingError,
    });

    if (result.error !== undefined) {
      return yield* Effect.fail(result.error);
    }
    return result;
  });
}

/**
 * Run one CLI invocation and report to stderr
 *
 * @returns The process exit status
 */
export async function runGuessEncoding(
  inputs: readonly string[],
  options: InferenceOptions,
  stdin?: Readable
): Promise<ExitCode> {
  const outcome = await Effect.runPromise(Effect.either(guessEncodingProgram(inputs, options, stdin)));

  if (Either.isLeft(outcome)) {
    logError(outcome.left.message);
    return exitCodeFor(outcome.left);
  }

  const result = outcome.right;
  if (result.heuristic) {
    logInfo(
      result.state === "unique-locked"
        ? "# candidate set narrowed heuristically and held until end of input"
        : "# candidate set narrowed heuristically"
    );
  }
  logInfo(formatResult(result));
  return EXIT_CODES.SUCCESS;
}
