#!/usr/bin/env tsx

import { Command, InvalidArgumentError } from "commander";
import { runGuessEncoding } from "../cli/run";
import { EXIT_CODES } from "../errors";
import { logError } from "../logger";

const parseMaxLines = (value: string): number => {
  const numeric = Number(value);
  if (!Number.isInteger(numeric) || numeric <= 0) {
    throw new InvalidArgumentError("Number of quality lines must be a positive integer.");
  }
  return numeric;
};

interface GuessEncodingCliOptions {
  maxLines?: number;
  disableEarlyStopFromHeuristics?: boolean;
  disableUncertainHeuristics?: boolean;
}

new Command()
  .name("guess-encoding")
  .description(
    "Guess the quality encoding of a FASTQ file from its quality lines.\n" +
      "Reads <fastq> or, without one, standard input (gzip, zstd and bzip2 are decompressed)."
  )
  .version("0.1.0", "-v, --version", "Show version")
  .argument("[fastq...]", "FASTQ file (a single file; omit or use - for stdin)")
  .option(
    "-n, --max-lines <n>",
    "number of quality lines to test; by default test until end of input or until a single encoding is determined",
    parseMaxLines
  )
  .option(
    "-H, --disable-early-stop-from-heuristics",
    "keep reading when only the uncertain heuristic made the guess unique"
  )
  .option(
    "-u, --disable-uncertain-heuristics",
    "do not use the uncertain (frequency based) heuristic"
  )
  .helpOption("-h, --help", "Show help")
  .action(async (inputs: string[], opts: GuessEncodingCliOptions) => {
    try {
      process.exitCode = await runGuessEncoding(inputs, opts);
    } catch (err) {
      logError(err instanceof Error ? err.message : String(err));
      process.exitCode = EXIT_CODES.UNEXPECTED;
    }
  })
  .parseAsync()
  .catch((err: unknown) => {
    logError(err instanceof Error ? err.message : String(err));
    process.exitCode = EXIT_CODES.UNEXPECTED;
  });
