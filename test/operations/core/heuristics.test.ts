/**
 * Tests for Illumina 1.3 / 1.5 disambiguation
 */

import { describe, expect, test } from "vitest";
import { AMBIGUOUS_PAIR, disambiguate, TOP_N_FREQUENT } from "../../../src/operations/core/quality";
import type { EncodingName } from "../../../src/types";

const AMBIGUOUS: EncodingName[] = ["Illumina-1.3", "Illumina-1.5", "Solexa"];

describe("disambiguate", () => {
  test("targets the Illumina 1.3 / 1.5 pair", () => {
    expect(AMBIGUOUS_PAIR).toEqual({ lower: "Illumina-1.3", higher: "Illumina-1.5" });
    expect(TOP_N_FREQUENT).toBe(4);
  });

  test("leaves sets without both members of the pair unchanged", () => {
    const histogram = new Map([[66, 10]]);
    expect(disambiguate(["Illumina-1.3", "Solexa"], histogram, true)).toEqual({
      candidates: ["Illumina-1.3", "Solexa"],
      heuristic: false,
    });
    expect(disambiguate(["Illumina-1.5"], histogram, true)).toEqual({
      candidates: ["Illumina-1.5"],
      heuristic: false,
    });
  });

  describe("hard rule", () => {
    test("removes Illumina 1.5 when Q0 ('@') occurs", () => {
      const histogram = new Map([
        [64, 1],
        [104, 5],
      ]);
      expect(disambiguate(AMBIGUOUS, histogram, false)).toEqual({
        candidates: ["Illumina-1.3", "Solexa"],
        heuristic: false,
      });
    });

    test("removes Illumina 1.5 when Q1 ('A') occurs, even if 'B' dominates", () => {
      const histogram = new Map([
        [65, 1],
        [66, 20],
      ]);
      expect(disambiguate(AMBIGUOUS, histogram, true)).toEqual({
        candidates: ["Illumina-1.3", "Solexa"],
        heuristic: false,
      });
    });

    test("does not mutate the input", () => {
      const candidates = [...AMBIGUOUS];
      disambiguate(candidates, new Map([[64, 1]]), true);
      expect(candidates).toEqual(AMBIGUOUS);
    });
  });

  describe("soft rule", () => {
    test("collapses to Illumina 1.5 when 'B' is among the most frequent codes", () => {
      const histogram = new Map([
        [66, 4],
        [103, 2],
        [104, 2],
      ]);
      expect(disambiguate(AMBIGUOUS, histogram, true)).toEqual({
        candidates: ["Illumina-1.5"],
        heuristic: true,
      });
    });

    test("is skipped when uncertain heuristics are disallowed", () => {
      const histogram = new Map([[66, 4]]);
      expect(disambiguate(AMBIGUOUS, histogram, false)).toEqual({
        candidates: AMBIGUOUS,
        heuristic: false,
      });
    });

    test("ignores 'B' outside the top four", () => {
      const histogram = new Map([
        [66, 1],
        [100, 5],
        [101, 5],
        [102, 5],
        [103, 5],
      ]);
      expect(disambiguate(AMBIGUOUS, histogram, true).heuristic).toBe(false);
    });

    test("counts 'B' among the top four on tied counts", () => {
      const histogram = new Map([
        [103, 2],
        [102, 2],
        [101, 2],
        [100, 2],
        [66, 2],
      ]);
      expect(disambiguate(AMBIGUOUS, histogram, true)).toEqual({
        candidates: ["Illumina-1.5"],
        heuristic: true,
      });
    });
  });
});
