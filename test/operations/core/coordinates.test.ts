/**
 * Tests for region arithmetic and coordinate conversion
 */

import { describe, expect, test } from "vitest";
import { CoordinateError, StrandError, ValidationError } from "../../../src/errors";
import {
  contains,
  createRegion,
  encloses,
  extendRegion,
  extractSequence,
  extractStrandSequence,
  formatRegion,
  fromE53,
  intersection,
  locationFromE53,
  overlaps,
  regionFromUpperLength,
  regionLength,
  regionPhase,
  regionsEqual,
  resolveBounds,
  strandSymbol,
  toE53,
} from "../../../src/operations/core/coordinates";

describe("5'/3' conversion", () => {
  test("forward ends", () => {
    expect(fromE53(3, 7)).toEqual({ strand: 1, lower: 2, upper: 7 });
  });

  test("reverse ends", () => {
    expect(fromE53(7, 3)).toEqual({ strand: -1, lower: 2, upper: 7 });
  });

  test("equal ends give a strandless single base", () => {
    const point = fromE53(4, 4);
    expect(point).toEqual({ strand: 0, lower: 3, upper: 4 });
    expect(regionLength(point)).toBe(1);
    expect(toE53(point)).toEqual({ end5: 4, end3: 4 });
  });

  test("round-trips whenever the ends differ", () => {
    for (let end5 = 1; end5 <= 12; end5++) {
      for (let end3 = 1; end3 <= 12; end3++) {
        if (end5 === end3) continue;
        expect(toE53(fromE53(end5, end3))).toEqual({ end5, end3 });
      }
    }
  });

  test("rejects ends below 1", () => {
    expect(() => fromE53(0, 5)).toThrow(CoordinateError);
    expect(() => fromE53(2.5, 5)).toThrow(CoordinateError);
  });

  test("builds locations", () => {
    expect(locationFromE53("contig-1", 10, 1, 2)).toEqual({
      source: "contig-1",
      phase: 2,
      strand: -1,
      lower: 0,
      upper: 10,
    });
  });
});

describe("region construction", () => {
  test("createRegion defaults to strandless", () => {
    expect(createRegion(2, 8)).toEqual({ strand: 0, lower: 2, upper: 8 });
  });

  test("createRegion rejects bad bounds and strands", () => {
    expect(() => createRegion(8, 2)).toThrow(CoordinateError);
    expect(() => createRegion(-1, 2)).toThrow(CoordinateError);
    expect(() => createRegion(0, 2, 2)).toThrow(StrandError);
  });

  test("regionFromUpperLength", () => {
    expect(regionFromUpperLength(10, 4, 1)).toEqual({ strand: 1, lower: 6, upper: 10 });
    expect(() => regionFromUpperLength(3, 4)).toThrow(CoordinateError);
  });

  test("resolveBounds fills defaults and checks limits", () => {
    expect(resolveBounds(12)).toEqual({ lower: 0, upper: 12 });
    expect(resolveBounds(12, 3)).toEqual({ lower: 3, upper: 12 });
    expect(() => resolveBounds(12, 3, 20)).toThrow(CoordinateError);
    expect(() => resolveBounds(12, 6, 3)).toThrow("Upper bound 3 is less than lower bound 6");
  });
});

describe("region arithmetic", () => {
  const a = { strand: 1, lower: 0, upper: 9 } as const;
  const b = { strand: -1, lower: 6, upper: 12 } as const;

  test("length and phase", () => {
    expect(regionLength(a)).toBe(9);
    expect(regionPhase(a)).toBe(0);
    expect(regionPhase({ strand: 1, lower: 0, upper: 10 })).toBe(1);
    expect(regionPhase({ strand: 1, lower: 0, upper: 11 })).toBe(2);
  });

  test("contains is inclusive at both ends", () => {
    expect(contains(a, 0)).toBe(true);
    expect(contains(a, 9)).toBe(true);
    expect(contains(a, 10)).toBe(false);
  });

  test("overlap needs a shared base", () => {
    expect(overlaps(a, b)).toBe(true);
    expect(overlaps(a, { strand: 1, lower: 9, upper: 12 })).toBe(false);
  });

  test("encloses", () => {
    expect(encloses(a, { strand: 1, lower: 3, upper: 6 })).toBe(true);
    expect(encloses(a, b)).toBe(false);
  });

  test("equality includes strand", () => {
    expect(regionsEqual(a, { strand: 1, lower: 0, upper: 9 })).toBe(true);
    expect(regionsEqual(a, { strand: -1, lower: 0, upper: 9 })).toBe(false);
  });

  test("intersection keeps the strand only when both agree", () => {
    expect(intersection(a, b)).toEqual({ strand: 0, lower: 6, upper: 9 });
    expect(intersection(a, { strand: 1, lower: 3, upper: 20 })).toEqual({
      strand: 1,
      lower: 3,
      upper: 9,
    });
    expect(intersection(a, { strand: 1, lower: 9, upper: 20 })).toBeUndefined();
  });

  test("extendRegion grows and shrinks", () => {
    expect(extendRegion({ strand: 1, lower: 3, upper: 6 }, 3)).toEqual({
      strand: 1,
      lower: 0,
      upper: 9,
    });
    expect(extendRegion({ strand: 1, lower: 3, upper: 9 }, -1, -2)).toEqual({
      strand: 1,
      lower: 4,
      upper: 7,
    });
    expect(() => extendRegion({ strand: 1, lower: 3, upper: 6 }, 4)).toThrow(CoordinateError);
  });
});

describe("sequence extraction", () => {
  test("extracts forward bases", () => {
    expect(extractSequence("AACCGGTT", { strand: -1, lower: 2, upper: 5 })).toBe("CCG");
  });

  test("extracts strand-oriented bases", () => {
    expect(extractStrandSequence("AACCGGTT", { strand: -1, lower: 2, upper: 5 })).toBe("CGG");
    expect(extractStrandSequence("AACCGGTT", { strand: 1, lower: 2, upper: 5 })).toBe("CCG");
  });

  test("rejects regions past the end", () => {
    try {
      extractSequence("ACGT", { strand: 1, lower: 2, upper: 6 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CoordinateError);
      if (error instanceof CoordinateError) {
        expect(error.code).toBe("OUT_OF_RANGE");
        expect(error.lower).toBe(2);
        expect(error.upper).toBe(6);
      }
    }
  });
});

describe("formatting", () => {
  test("lus format pads both numbers", () => {
    expect(formatRegion({ strand: 1, lower: 0, upper: 9 })).toBe("[ 0           9 + ]");
    expect(formatRegion({ strand: -1, lower: 12, upper: 345 }, { width: 3 })).toBe(
      "[ 12  345 - ]"
    );
    expect(formatRegion({ strand: 0, lower: 3, upper: 4 }, { width: 0 })).toBe("[ 3 4 . ]");
  });

  test("53 format", () => {
    expect(formatRegion({ strand: 1, lower: 0, upper: 9 }, { method: "53", width: 3 })).toBe(
      "<5' 1     9 3'>"
    );
    expect(formatRegion({ strand: -1, lower: 2, upper: 7 }, { method: "53", width: 1 })).toBe(
      "<5' 7 3 3'>"
    );
  });

  test("rejects a negative width", () => {
    expect(() => formatRegion({ strand: 1, lower: 0, upper: 9 }, { width: -1 })).toThrow(
      ValidationError
    );
  });

  test("strand symbols", () => {
    expect(strandSymbol(1)).toBe("+");
    expect(strandSymbol(-1)).toBe("-");
    expect(strandSymbol(0)).toBe(".");
    expect(strandSymbol(2)).toBe("?");
  });
});
