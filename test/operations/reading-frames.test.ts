/**
 * Tests for ORF/CDS search and stop-free frame screening
 */

import { describe, expect, test } from "vitest";
import { CoordinateError, StrandError, ValidationError } from "../../src/errors";
import { randomDNA } from "../../src/operations/core/alphabet";
import { getTranslationTable } from "../../src/operations/core/codon-table";
import { MatcherCache } from "../../src/operations/core/pattern-matcher";
import { FrameScanner } from "../../src/operations/reading-frames";
import type { CdsConfig, FindOptions, SearchConfig, StrictLevel } from "../../src/types";

const scanner = new FrameScanner();

/** Deterministic uniform source for property checks */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

describe("getORF", () => {
  test("finds the longest stop-to-stop span on either strand", () => {
    // No reverse-strand stops, so the whole sequence is open on strand -1
    expect(scanner.getORF("TAGAAATAG")).toEqual({ strand: -1, lower: 0, upper: 9 });
  });

  test("includes the terminal stop on the forward strand", () => {
    expect(scanner.getORF("TAGAAATAG", { strand: 1 })).toEqual({ strand: 1, lower: 3, upper: 9 });
  });

  test("closes frames at the upper bound", () => {
    // Frames 2 and 3 have no stops and run to the last whole codon
    expect(scanner.getORF("TAATAATAA", { strand: 1 })).toEqual({ strand: 1, lower: 2, upper: 8 });
  });

  test("keeps the first span on ties", () => {
    expect(scanner.getORF("ATGNNNNNNTAA")).toEqual({ strand: -1, lower: 0, upper: 12 });
  });

  test("respects lower and upper bounds", () => {
    expect(scanner.getORF("TAGAAATAG", { strand: 1, lower: 1 })).toEqual({
      strand: 1,
      lower: 3,
      upper: 9,
    });
    expect(scanner.getORF("TAGAAATAG", { strand: 1, lower: 1, upper: 8 })).toEqual({
      strand: 1,
      lower: 2,
      upper: 8,
    });
  });

  test("returns undefined for sequences shorter than a codon", () => {
    expect(scanner.getORF("AT")).toBeUndefined();
    expect(scanner.getORF("")).toBeUndefined();
  });

  test("always returns whole codons inside the bounds", () => {
    const random = lcg(7);
    for (let i = 0; i < 50; i++) {
      const seq = randomDNA(20 + i, random);
      const orf = scanner.getORF(seq);
      if (orf !== undefined) {
        expect(orf.lower).toBeLessThanOrEqual(orf.upper);
        expect((orf.upper - orf.lower) % 3).toBe(0);
        expect(orf.upper).toBeLessThanOrEqual(seq.length);
      }
    }
  });

  test("cleans input unless told it is sanitized", () => {
    expect(scanner.getORF(">read\ntag aaa uag", { strand: 1 })).toEqual({
      strand: 1,
      lower: 3,
      upper: 9,
    });
    expect(() => scanner.getORF("tagaaatag", { sanitized: true })).toThrow(ValidationError);
  });

  test("rejects invalid strands and bounds", () => {
    // Options as an untyped caller would send them
    const wrongStrand: SearchConfig = JSON.parse('{ "strand": 2 }');
    expect(() => scanner.getORF("TAGAAATAG", wrongStrand)).toThrow(StrandError);
    expect(() => scanner.getORF("TAGAAATAG", { lower: 6, upper: 3 })).toThrow(CoordinateError);
    expect(() => scanner.getORF("TAGAAATAG", { upper: 12 })).toThrow(CoordinateError);
    expect(() => scanner.getORF("TAGAAATAG", { lower: 1.5 })).toThrow(ValidationError);
  });
});

describe("getCDS", () => {
  test("finds a start-to-stop span", () => {
    expect(scanner.getCDS("ATGAAATAG", { strict: 1, strand: 1 })).toEqual({
      strand: 1,
      lower: 0,
      upper: 9,
    });
    expect(scanner.getCDS("ATGAAATAG")).toEqual({ strand: 1, lower: 0, upper: 9 });
  });

  test("keeps the first start of an open frame", () => {
    expect(scanner.getCDS("ATGATGTAA", { strand: 1 })).toEqual({ strand: 1, lower: 0, upper: 9 });
  });

  test("returns undefined for sequences shorter than a codon", () => {
    expect(scanner.getCDS("AT")).toBeUndefined();
  });

  test("respects bounds", () => {
    expect(scanner.getCDS("GCCGCCATGAAATAGGCC", { strand: 1, lower: 3, upper: 15 })).toEqual({
      strand: 1,
      lower: 6,
      upper: 15,
    });
    expect(scanner.getCDS("GCCGCCATGAAATAGGCC", { strand: 1, strict: 0, lower: 3 })).toEqual({
      strand: 1,
      lower: 3,
      upper: 15,
    });
  });

  describe("strict levels on strand 1", () => {
    const cases: Array<[string, StrictLevel, [number, number] | undefined]> = [
      // start at 6, stop ending at 15
      ["GCCGCCATGAAATAGGCC", 0, [0, 15]],
      ["GCCGCCATGAAATAGGCC", 1, [6, 15]],
      ["GCCGCCATGAAATAGGCC", 2, [6, 15]],
      // start at 3, no stop
      ["GCCATGAAAGCCGCC", 0, [0, 15]],
      ["GCCATGAAAGCCGCC", 1, [3, 15]],
      ["GCCATGAAAGCCGCC", 2, undefined],
      // stop at 9, no start
      ["GCCAAAGCCTAAGCC", 0, [0, 12]],
      ["GCCAAAGCCTAAGCC", 1, undefined],
      ["GCCAAAGCCTAAGCC", 2, undefined],
    ];

    test.each(cases)("%s with strict %i", (seq, strict, expected) => {
      const cds = scanner.getCDS(seq, { strand: 1, strict });
      expect(cds).toEqual(
        expected === undefined ? undefined : { strand: 1, lower: expected[0], upper: expected[1] }
      );
    });
  });

  describe("strict levels on strand -1", () => {
    // Reverse complements of the strand 1 cases
    const cases: Array<[string, StrictLevel, [number, number] | undefined]> = [
      ["GGCCTATTTCATGGCGGC", 0, [3, 18]],
      ["GGCCTATTTCATGGCGGC", 1, [3, 12]],
      ["GGCCTATTTCATGGCGGC", 2, [3, 12]],
      ["GGCGGCTTTCATGGC", 0, [0, 15]],
      ["GGCGGCTTTCATGGC", 1, [0, 12]],
      ["GGCGGCTTTCATGGC", 2, undefined],
      ["GGCTTAGGCTTTGGC", 0, [3, 15]],
      ["GGCTTAGGCTTTGGC", 1, undefined],
      ["GGCTTAGGCTTTGGC", 2, undefined],
    ];

    test.each(cases)("%s with strict %i", (seq, strict, expected) => {
      const cds = scanner.getCDS(seq, { strand: -1, strict });
      expect(cds).toEqual(
        expected === undefined ? undefined : { strand: -1, lower: expected[0], upper: expected[1] }
      );
    });
  });

  test("searches both strands by default", () => {
    expect(scanner.getCDS("GGCCTATTTCATGGCGGC")).toEqual({ strand: -1, lower: 3, upper: 12 });
    expect(scanner.getCDS("GCCGCCATGAAATAGGCC", { strict: 2 })).toEqual({
      strand: 1,
      lower: 6,
      upper: 15,
    });
  });

  test("rejects an unknown strict level", () => {
    const config: CdsConfig = JSON.parse('{ "strict": 3 }');
    expect(() => scanner.getCDS("ATGAAATAG", config)).toThrow(ValidationError);
  });
});

describe("nonstop", () => {
  test("lists frames without stop codons", () => {
    expect(scanner.nonstop("TACGTTGGTTAAGTT")).toEqual([2, 3, -1, -3]);
  });

  test("restricts to one strand", () => {
    expect(scanner.nonstop("TACGTTGGTTAAGTT", { strand: 1 })).toEqual([2, 3]);
    expect(scanner.nonstop("TACGTTGGTTAAGTT", { strand: -1 })).toEqual([-1, -3]);
  });

  test("every frame of a short sequence is open", () => {
    expect(scanner.nonstop("AT")).toEqual([1, 2, 3, -1, -2, -3]);
  });
});

describe("find", () => {
  test("finds codons of a residue", () => {
    expect(scanner.find("ATGATGA", "M")).toEqual([0, 3]);
    expect(scanner.find("ATGATGA", "start")).toEqual([0, 3]);
  });

  test("finds reverse-strand codons", () => {
    expect(scanner.find("TCATCA", "*", { strand: -1 })).toEqual([0, 3]);
  });

  test("rejects strand 0", () => {
    const config: FindOptions = JSON.parse('{ "strand": 0 }');
    expect(() => scanner.find("TCATCA", "*", config)).toThrow(StrandError);
  });
});

describe("alternative tables", () => {
  test("uses the scanner's table for stops", () => {
    const mito = new FrameScanner(getTranslationTable(2), new MatcherCache());
    // TGA is tryptophan in vertebrate mitochondria
    expect(mito.getORF("TGATGATGA", { strand: 1 })).toEqual({ strand: 1, lower: 0, upper: 9 });
    expect(scanner.getORF("TGATGATGA", { strand: 1 })).toEqual({ strand: 1, lower: 2, upper: 8 });
  });
});
