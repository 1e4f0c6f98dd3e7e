/**
 * Tests for the encoding inference engine
 */

import { describe, expect, test } from "vitest";
import {
  ConfigurationError,
  InferenceStateError,
  NoEncodingMatchesRangeError,
  NoQualityDataError,
} from "../../../src/errors";
import {
  ENCODING_RANGES,
  EncodingInferenceEngine,
  inferEncoding,
} from "../../../src/operations/core/quality";
import type { LineOutcome } from "../../../src/types";

async function* asAsync(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

describe("EncodingInferenceEngine", () => {
  test("starts scanning with no bounds and no candidates", () => {
    const engine = new EncodingInferenceEngine();
    expect(engine.state).toBe("scanning");
    expect(engine.bounds).toBeUndefined();
    expect(engine.candidates).toEqual([]);
    expect(engine.stopped).toBe(false);
  });

  test("recomputes candidates only when the bounds widen", () => {
    const engine = new EncodingInferenceEngine();

    expect(engine.consume("IIII####")).toEqual({
      kind: "observed",
      lineNumber: 1,
      bounds: { min: 35, max: 73 },
      boundsChanged: true,
      candidatesChanged: true,
    });
    expect(engine.consume("5555")).toEqual({
      kind: "observed",
      lineNumber: 2,
      bounds: { min: 53, max: 53 },
      boundsChanged: false,
      candidatesChanged: false,
    });
    expect(engine.consume("!!")).toEqual({
      kind: "observed",
      lineNumber: 3,
      bounds: { min: 33, max: 33 },
      boundsChanged: true,
      candidatesChanged: false,
    });
    expect(engine.bounds).toEqual({ min: 33, max: 73 });
    expect(engine.candidates).toEqual(["Illumina-1.8", "Sanger"]);
  });

  test("stays ambiguous for data within 33-73", () => {
    const engine = new EncodingInferenceEngine();
    engine.consume("IIII####");
    engine.consume("5555+++!");

    expect(engine.finish()).toEqual({
      state: "exhausted",
      stopReason: "end-of-input",
      candidates: ["Illumina-1.8", "Sanger"],
      bounds: { min: 33, max: 73 },
      heuristic: false,
      linesConsumed: 2,
      linesSkipped: 0,
    });
  });

  test("stops early once a single encoding remains", () => {
    const engine = new EncodingInferenceEngine();
    engine.consume("IIJJ");

    expect(engine.state).toBe("unique");
    expect(engine.stopped).toBe(true);
    expect(engine.candidates).toEqual(["Illumina-1.8"]);
    expect(() => engine.consume("hhhh")).toThrow(InferenceStateError);
    expect(engine.finish().stopReason).toBe("unique");
  });

  test("enters the error state when no encoding fits", () => {
    const engine = new EncodingInferenceEngine();
    engine.consume("\nx");

    const result = engine.finish();
    expect(result.state).toBe("error");
    expect(result.stopReason).toBe("no-match");
    expect(result.candidates).toEqual([]);
    expect(result.bounds).toEqual({ min: 10, max: 120 });
    expect(result.error).toBeInstanceOf(NoEncodingMatchesRangeError);
    expect(result.error?.message).toBe("no encodings for range: (10, 120)");
  });

  test("reports the quality line that widened the bounds past every range", () => {
    const engine = new EncodingInferenceEngine();
    engine.consume("####");
    engine.consume("hhhh");

    const result = engine.finish();
    expect(result.state).toBe("error");
    expect(result.bounds).toEqual({ min: 35, max: 104 });
    expect(result.error?.lineNumber).toBe(2);
  });

  describe("line limit", () => {
    test("ends in exhausted with an ambiguous answer", () => {
      const engine = new EncodingInferenceEngine({ maxLines: 5 });
      for (let i = 0; i < 5; i++) {
        engine.consume("IIII####");
      }

      expect(engine.state).toBe("exhausted");
      expect(engine.finish()).toEqual({
        state: "exhausted",
        stopReason: "line-limit",
        candidates: ["Illumina-1.8", "Sanger"],
        bounds: { min: 35, max: 73 },
        heuristic: false,
        linesConsumed: 5,
        linesSkipped: 0,
      });
    });

    test("keeps scanning past a unique answer until the limit", () => {
      const engine = new EncodingInferenceEngine({ maxLines: 3 });
      engine.consume("IIJJ");
      expect(engine.state).toBe("scanning");
      engine.consume("IIJJ");
      engine.consume("IIJJ");

      const result = engine.finish();
      expect(result.state).toBe("exhausted");
      expect(result.stopReason).toBe("line-limit");
      expect(result.candidates).toEqual(["Illumina-1.8"]);
      expect(result.linesConsumed).toBe(3);
    });

    test("counts empty lines towards the limit", () => {
      const engine = new EncodingInferenceEngine({ maxLines: 2 });
      engine.consume("IIII");
      engine.consume("");
      expect(engine.state).toBe("exhausted");
      expect(engine.finish().linesSkipped).toBe(1);
    });

    test("reports missing data when the limit only covered empty lines", () => {
      const engine = new EncodingInferenceEngine({ maxLines: 2 });
      engine.consume("");
      engine.consume("");

      const result = engine.finish();
      expect(result.state).toBe("error");
      expect(result.stopReason).toBe("no-data");
      expect(result.error).toBeInstanceOf(NoQualityDataError);
    });
  });

  describe("heuristics", () => {
    test("collapses to Illumina 1.5 and stops when 'B' dominates", () => {
      const engine = new EncodingInferenceEngine();
      engine.consume("BBBBhhgg");

      const result = engine.finish();
      expect(result.state).toBe("unique");
      expect(result.candidates).toEqual(["Illumina-1.5"]);
      expect(result.bounds).toEqual({ min: 66, max: 104 });
      expect(result.heuristic).toBe(true);
    });

    test("keeps the range answer when uncertain heuristics are disabled", () => {
      const engine = new EncodingInferenceEngine({ disableUncertainHeuristics: true });
      engine.consume("BBBBhhgg");

      const result = engine.finish();
      expect(result.state).toBe("exhausted");
      expect(result.candidates).toEqual(["Illumina-1.3", "Illumina-1.5", "Solexa"]);
      expect(result.heuristic).toBe(false);
    });

    test("cannot pick Illumina 1.5 once '@' widened the bounds to 64", () => {
      for (const disableUncertainHeuristics of [false, true]) {
        const engine = new EncodingInferenceEngine({ disableUncertainHeuristics });
        engine.consume("@BBBhhhh");

        const result = engine.finish();
        expect(result.bounds).toEqual({ min: 64, max: 104 });
        expect(result.candidates).toEqual(["Illumina-1.3", "Solexa"]);
        expect(result.heuristic).toBe(false);
      }
    });

    test("applies the hard rule with a table where Illumina 1.5 reaches '@'", () => {
      const table = { ...ENCODING_RANGES, "Illumina-1.5": { min: 60, max: 105 } };
      const engine = new EncodingInferenceEngine({}, table);
      engine.consume("@@hh");

      expect(engine.candidates).toEqual(["Illumina-1.3", "Solexa"]);
    });

    test("locks a heuristic answer when early stopping on it is disabled", () => {
      const engine = new EncodingInferenceEngine({ disableEarlyStopFromHeuristics: true });

      engine.consume("BBBBhhgg");
      expect(engine.state).toBe("unique-locked");
      expect(engine.stopped).toBe(false);

      const outcome: LineOutcome = engine.consume("BBBBii");
      expect(outcome).toEqual({
        kind: "observed",
        lineNumber: 2,
        bounds: { min: 66, max: 105 },
        boundsChanged: true,
        candidatesChanged: false,
      });

      // Would match nothing if candidates were still recomputed
      engine.consume("####");

      expect(engine.finish()).toEqual({
        state: "unique-locked",
        stopReason: "end-of-input",
        candidates: ["Illumina-1.5"],
        bounds: { min: 35, max: 105 },
        heuristic: true,
        linesConsumed: 3,
        linesSkipped: 0,
      });
    });

    test("does not lock a unique answer reached by ranges alone", () => {
      const engine = new EncodingInferenceEngine({ disableEarlyStopFromHeuristics: true });
      engine.consume("IIJJ");
      expect(engine.state).toBe("unique");
    });
  });

  describe("empty lines", () => {
    test("are skipped without touching the bounds", () => {
      const engine = new EncodingInferenceEngine();

      expect(engine.consume("")).toEqual({ kind: "skipped", reason: "empty", lineNumber: 1 });
      engine.consume("IIII####");
      engine.consume("");

      const result = engine.finish();
      expect(result.bounds).toEqual({ min: 35, max: 73 });
      expect(result.linesConsumed).toBe(3);
      expect(result.linesSkipped).toBe(2);
    });

    test("alone produce a no-data error", () => {
      const engine = new EncodingInferenceEngine();
      engine.consume("");
      engine.consume("");

      const result = engine.finish();
      expect(result.state).toBe("error");
      expect(result.error?.message).toBe("no quality characters found in 2 quality line(s)");
    });
  });

  test("reports an input without quality lines", () => {
    const result = new EncodingInferenceEngine().finish();
    expect(result.stopReason).toBe("no-data");
    expect(result.error?.message).toBe("no quality lines found in input");
  });

  test("returns the same result from repeated finish calls", () => {
    const engine = new EncodingInferenceEngine();
    engine.consume("IIII####");
    expect(engine.finish()).toEqual(engine.finish());
  });

  test("rejects invalid options", () => {
    expect(() => new EncodingInferenceEngine({ maxLines: 0 })).toThrow(ConfigurationError);
    expect(() => new EncodingInferenceEngine({ maxLines: 2.5 })).toThrow(ConfigurationError);
    expect(() => new EncodingInferenceEngine({ maxLines: undefined })).not.toThrow();
  });
});

describe("inferEncoding", () => {
  test("stops reading once the engine stops", async () => {
    const seen: LineOutcome[] = [];
    const result = await inferEncoding(["IIJJ", "hhhh", "hhhh"], {}, (outcome) => seen.push(outcome));

    expect(result.state).toBe("unique");
    expect(result.linesConsumed).toBe(1);
    expect(seen).toHaveLength(1);
  });

  test("honours the line limit on async input", async () => {
    const lines = Array.from({ length: 8 }, () => "IIII####");
    const result = await inferEncoding(asAsync(lines), { maxLines: 5 });

    expect(result.state).toBe("exhausted");
    expect(result.candidates).toEqual(["Illumina-1.8", "Sanger"]);
    expect(result.linesConsumed).toBe(5);
  });

  test("returns the error state instead of throwing", async () => {
    const result = await inferEncoding(["####", "hhhh", "IIII"]);
    expect(result.state).toBe("error");
    expect(result.linesConsumed).toBe(2);
  });

  test("gives the same answer on repeated runs", async () => {
    const lines = ["BBBBhhgg", "IIII", "hhhh"];
    const options = { disableEarlyStopFromHeuristics: true };
    expect(await inferEncoding(lines, options)).toEqual(await inferEncoding(lines, options));
  });
});
