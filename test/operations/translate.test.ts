/**
 * Tests for Translator
 */

import { describe, expect, test } from "vitest";
import {
  CoordinateError,
  GeneticCodeError,
  ParseError,
  StrandError,
  ValidationError,
} from "../../src/errors";
import { CODON_SYMBOLS, randomDNA } from "../../src/operations/core/alphabet";
import { getGeneticCode } from "../../src/operations/core/genetic-codes";
import { Translator } from "../../src/operations/translate";
import type { Region, TranslateOptions } from "../../src/types";

const SEQ = "CTGATATCATGCATGCCATTCTCGACCGCTATGCGCCTCCTGTTCCTCGTGGGCCCAAAA";
const translator = new Translator();

/** Park-Miller generator; products stay below 2^53 */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

/** Random sequence over concrete and degenerate symbols */
function randomIupac(length: number, random: () => number): string {
  let sequence = "";
  for (let i = 0; i < length; i++) {
    sequence += CODON_SYMBOLS.charAt(Math.floor(random() * CODON_SYMBOLS.length));
  }
  return sequence;
}

describe("Translator", () => {
  describe("translate", () => {
    test("substitutes M for a leading start codon", () => {
      expect(translator.translate(SEQ)).toBe("MISCMPFSTAMRLLFLVGPK");
      expect(translator.translate("CTGGCCTAA")).toBe("MA*");
    });

    test("keeps the leading residue with partial5", () => {
      expect(translator.translate(SEQ, { partial5: true })).toBe("LISCMPFSTAMRLLFLVGPK");
      expect(translator.translate("CTGGCCTAA", { partial5: true })).toBe("LA*");
    });

    test("reads strand -1 from the 3' end", () => {
      expect(translator.translate(SEQ, { strand: -1 })).toBe("FWAHEEQEAHSGREWHA*YQ");
      expect(translator.translate("CTATTTCAT", { strand: -1 })).toBe("MK*");
    });

    test("translates between bounds and drops a trailing partial codon", () => {
      expect(translator.translate(SEQ, { lower: 3, upper: 15 })).toBe("ISCM");
      expect(translator.translate(SEQ, { lower: 1, partial5: true })).toBe(
        "*YHACHSRPLCASCSSWAQ"
      );
    });

    test("resolves degenerate codons and marks ambiguous ones", () => {
      expect(translator.translate("ATGGGNTAR")).toBe("MG*");
      expect(translator.translate("ATGNNNNNNTAA")).toBe("MXX*");
    });

    test("cleans the sequence first", () => {
      expect(translator.translate(">cds\naug aaa uag\n")).toBe("MK*");
    });

    test("rejects strand 0 and bad bounds", () => {
      const options: TranslateOptions = JSON.parse('{ "strand": 0 }');
      expect(() => translator.translate("ATGAAATAG", options)).toThrow(StrandError);
      expect(() => translator.translate("ATGAAATAG", { upper: 10 })).toThrow(CoordinateError);
    });
  });

  describe("translateRange", () => {
    test("translates a CDS found by getCDS", () => {
      const cds = translator.getCDS(SEQ, { strict: 2 });
      expect(cds).toEqual({ strand: -1, lower: 28, upper: 58 });
      if (cds !== undefined) {
        expect(translator.translateRange(SEQ, cds)).toBe("MGPRGTGGA*");
      }
    });

    test("translates every ORF getORF reports", () => {
      const random = lcg(2024);
      let found = 0;

      for (let i = 0; i < 200; i++) {
        const length = 3 + Math.floor(random() * 60);
        const seq = i % 2 === 0 ? randomDNA(length, random) : randomIupac(length, random);
        const lower = Math.floor(random() * Math.floor(length / 2));
        const upper = lower + Math.floor(random() * (length - lower + 1));

        for (const strand of [-1, 0, 1] as const) {
          const orf = translator.getORF(seq, { strand, lower, upper });
          if (orf === undefined) continue;
          found++;
          const protein = translator.translateRange(seq, orf);
          expect(protein).toHaveLength((orf.upper - orf.lower) / 3);
        }
      }

      expect(found).toBeGreaterThan(0);
    });

    test("reads strandless regions forward", () => {
      expect(translator.translateRange(SEQ, { strand: 0, lower: 3, upper: 15 })).toBe("ISCM");
    });

    test("rejects regions past the end", () => {
      try {
        translator.translateRange("ATGAAATAG", { strand: 1, lower: 3, upper: 12 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CoordinateError);
        if (error instanceof CoordinateError) {
          expect(error.code).toBe("OUT_OF_RANGE");
        }
      }
    });

    test("rejects malformed regions", () => {
      expect(() =>
        translator.translateRange("ATGAAATAG", { strand: 1, lower: -3, upper: 6 })
      ).toThrow(ValidationError);
    });
  });

  describe("translateCodon", () => {
    test("translates single codons", () => {
      expect(translator.translateCodon("TTG")).toBe("L");
      expect(translator.translateCodon("TTG", { start: true })).toBe("M");
      expect(translator.translateCodon("CTA", { strand: -1 })).toBe("*");
      expect(translator.translateCodon("NNN")).toBe("X");
    });
  });

  describe("translateSixFrames", () => {
    test("returns raw translations of every frame", () => {
      expect(translator.translateSixFrames("ATGAAATAGC")).toEqual({
        "+1": "MK*",
        "+2": "*NS",
        "+3": "EI",
        "-1": "AIS",
        "-2": "LFH",
        "-3": "YF",
      });
    });

    test("short sequences give empty frames", () => {
      expect(translator.translateSixFrames("AT")).toEqual({
        "+1": "",
        "+2": "",
        "+3": "",
        "-1": "",
        "-2": "",
        "-3": "",
      });
    });
  });

  describe("translateExons", () => {
    test("splices forward exons in coordinate order", () => {
      const exons: Region[] = [
        { strand: 1, lower: 9, upper: 12 },
        { strand: 1, lower: 0, upper: 3 },
      ];
      expect(translator.translateExons("ATGCCCAAATAG", exons)).toBe("M*");
    });

    test("reads reverse exons as their reverse complement", () => {
      const exons: Region[] = [
        { strand: -1, lower: 0, upper: 3 },
        { strand: -1, lower: 6, upper: 9 },
      ];
      expect(translator.translateExons("CTAGGGCAT", exons)).toBe("M*");
    });

    test("rejects exons on different strands", () => {
      const exons: Region[] = [
        { strand: 1, lower: 0, upper: 3 },
        { strand: -1, lower: 6, upper: 9 },
      ];
      expect(() => translator.translateExons("CTAGGGCAT", exons)).toThrow(
        "Exons must all be on the same strand"
      );
    });

    test("returns an empty protein for no exons", () => {
      expect(translator.translateExons("ATGAAATAG", [])).toBe("");
    });
  });

  describe("genetic codes", () => {
    test("fromId picks start and stop codons of the code", () => {
      expect(translator.translate("TTGAAA")).toBe("MK");
      expect(Translator.fromId(2).translate("TTGAAA")).toBe("LK");
      expect(Translator.fromId(11).translate("GTGTGA")).toBe("M*");
      expect(Translator.fromId(2).translate("GTGTGA")).toBe("MW");
    });

    test("fromId rejects unknown codes", () => {
      expect(() => Translator.fromId(7)).toThrow(GeneticCodeError);
    });

    test("fromDefinition accepts a custom code", () => {
      const standard = getGeneticCode(1);
      if (standard === undefined) throw new Error("standard code missing");
      const custom = Translator.fromDefinition({
        ...standard,
        id: 101,
        codons: { ...standard.codons, TAG: "O" },
      });
      expect(custom.translate("ATGTAG")).toBe("MO");
      expect(custom.codons("O")).toEqual(["TAG"]);
    });

    test("fromNcbi reads gc.prt text", () => {
      // Standard code with TGA reassigned to tryptophan
      const custom = Translator.fromNcbi(`{
        name "Opal read-through" ,
        id 102 ,
        ncbieaa  "FFLLSSSSYY**CCWWLLLLPPPPHHQQRRRRIIIMTTTTNNKKSSRRVVVVAAAADDEEGGGG",
        sncbieaa "---M------**--*----M---------------M----------------------------"
      }`);
      expect(custom.table.id).toBe(102);
      expect(custom.translate("TGATGG")).toBe("WW");
      expect(() => Translator.fromNcbi("{ }")).toThrow(ParseError);
    });
  });

  describe("scanner access", () => {
    test("delegates reading-frame searches", () => {
      expect(translator.getORF("TAGAAATAG", { strand: 1 })).toEqual({
        strand: 1,
        lower: 3,
        upper: 9,
      });
      expect(translator.getCDS("ATGAAATAG")).toEqual({ strand: 1, lower: 0, upper: 9 });
      expect(translator.nonstop("TACGTTGGTTAAGTT")).toEqual([2, 3, -1, -3]);
      expect(translator.find("ATGATGA", "M")).toEqual([0, 3]);
      expect(translator.matcher("*", -1).codons).toEqual(["CTA", "TCA", "TTA", "TYA", "YTA"]);
      expect(translator.codons("W")).toEqual(["TGG"]);
    });
  });
});
