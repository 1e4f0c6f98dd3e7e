/**
 * Tests for per-line quality statistics
 */

import { describe, expect, test } from "vitest";
import { computeLineBounds, mostFrequentCodes } from "../../../src/operations/core/quality";

describe("computeLineBounds", () => {
  test("finds the ASCII range of a quality string", () => {
    const bounds = computeLineBounds("DLXYXXRXWYYTPMLUUQWTXTRSXSWMDMTRNDNSMJFJFFRMV");
    expect(bounds?.min).toBe(68);
    expect(bounds?.max).toBe(89);
  });

  test("counts every ASCII code in the histogram", () => {
    const bounds = computeLineBounds("DLXYXXRXWYYTPMLUUQWTXTRSXSWMDMTRNDNSMJFJFFRMV");
    expect(bounds?.histogram.get(88)).toBe(6); // X
    expect(bounds?.histogram.get(77)).toBe(5); // M
    expect(bounds?.histogram.get(64)).toBeUndefined();
  });

  test("handles a single character", () => {
    const bounds = computeLineBounds("I");
    expect(bounds?.min).toBe(73);
    expect(bounds?.max).toBe(73);
    expect([...(bounds?.histogram.entries() ?? [])]).toEqual([[73, 1]]);
  });

  test("returns undefined for an empty line", () => {
    expect(computeLineBounds("")).toBeUndefined();
  });

  test("does not validate characters", () => {
    const bounds = computeLineBounds("\tx ");
    expect(bounds?.min).toBe(9);
    expect(bounds?.max).toBe(120);
  });

  test("returns min <= max drawn from the line itself", () => {
    const samples = ["IIIII", "#+5?I", "hgfedcBA@", "~!", "JJJJJJJJJJ#", ";;;@@@hhh"];
    for (const sample of samples) {
      const bounds = computeLineBounds(sample);
      const codes = [...sample].map((char) => char.charCodeAt(0));
      expect(bounds).toBeDefined();
      if (bounds === undefined) continue;
      expect(bounds.min).toBeLessThanOrEqual(bounds.max);
      expect(codes).toContain(bounds.min);
      expect(codes).toContain(bounds.max);
    }
  });
});

describe("mostFrequentCodes", () => {
  test("orders codes by descending count", () => {
    const histogram = new Map([
      [70, 1],
      [66, 3],
      [90, 2],
    ]);
    expect(mostFrequentCodes(histogram, 2)).toEqual([66, 90]);
  });

  test("breaks ties on the lower code", () => {
    const histogram = new Map([
      [80, 3],
      [90, 2],
      [66, 3],
      [70, 1],
    ]);
    expect(mostFrequentCodes(histogram, 3)).toEqual([66, 80, 90]);
  });

  test("returns everything when n exceeds the histogram size", () => {
    expect(mostFrequentCodes(new Map([[73, 2]]), 4)).toEqual([73]);
  });

  test("returns nothing for n = 0", () => {
    expect(mostFrequentCodes(new Map([[73, 2]]), 0)).toEqual([]);
  });
});
