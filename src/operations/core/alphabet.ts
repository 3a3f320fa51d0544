/**
 * Nucleotide and amino-acid alphabets
 *
 * Symbol sets, IUPAC degenerate-code expansion, and the cleaning step every
 * raw sequence passes through before it is scanned or translated.
 *
 * @module alphabet
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const seq = cleanDNA(">mRNA\nacu gau\nauaga");
 * console.log(seq); // 'ACTGATATAGA'
 *
 * expandCodon("TAR"); // ['TAA', 'TAG']
 * ```
 */

import { ERROR_SUGGESTIONS, ValidationError } from "../../errors";

// =============================================================================
// NUCLEOTIDES
// =============================================================================

/**
 * Every nucleotide symbol accepted in a raw sequence, including U and the
 * IUPAC degenerate codes
 */
export const NUCLEOTIDES = "ABCDGHKMNRSTUVWY";

/**
 * IUPAC degenerate nucleotide codes
 */
export const DEGENERATE_NUCLEOTIDES = "BDHKMNRSVWY";

/**
 * The four concrete DNA bases, in codon-index order
 */
export const CONCRETE_NUCLEOTIDES = "ACGT";

/**
 * Symbols that may appear in a cleaned sequence: concrete bases first, then
 * degenerate codes
 */
export const CODON_SYMBOLS = CONCRETE_NUCLEOTIDES + DEGENERATE_NUCLEOTIDES;

/**
 * Concrete bases each degenerate code stands for
 */
export const DEGENERATE_MAP: Readonly<Record<string, readonly string[]>> = {
  N: ["A", "C", "G", "T"],
  V: ["A", "C", "G"], // not T
  H: ["A", "C", "T"], // not G
  D: ["A", "G", "T"], // not C
  B: ["C", "G", "T"], // not A
  M: ["A", "C"], // aMino
  R: ["A", "G"], // puRine
  W: ["A", "T"], // Weak
  S: ["C", "G"], // Strong
  Y: ["C", "T"], // pYrimidine
  K: ["G", "T"], // Keto
};

/**
 * Expand a single nucleotide symbol to the concrete bases it stands for.
 * Concrete bases expand to themselves; anything else expands to nothing.
 *
 * @example
 * ```typescript
 * expandNucleotide("R"); // ['A', 'G']
 * expandNucleotide("t"); // ['T']
 * ```
 */
export function expandNucleotide(symbol: string): readonly string[] {
  const upper = symbol.toUpperCase();
  if (upper.length === 1 && CONCRETE_NUCLEOTIDES.includes(upper)) {
    return [upper];
  }
  return DEGENERATE_MAP[upper] ?? [];
}

/**
 * Expand a codon into every concrete codon it can stand for (cross product
 * of its symbols' expansions)
 *
 * @example
 * ```typescript
 * expandCodon("TAR"); // ['TAA', 'TAG']
 * expandCodon("NNN").length; // 64
 * ```
 */
export function expandCodon(codon: string): string[] {
  let results = [""];

  for (const symbol of codon) {
    const bases = expandNucleotide(symbol);
    const next: string[] = [];
    for (const prefix of results) {
      for (const base of bases) {
        next.push(prefix + base);
      }
    }
    results = next;
  }

  return results;
}

/**
 * Whether a codon contains any degenerate symbol
 */
export function isDegenerate(codon: string): boolean {
  for (const symbol of codon.toUpperCase()) {
    if (DEGENERATE_NUCLEOTIDES.includes(symbol)) return true;
  }
  return false;
}

// =============================================================================
// AMINO ACIDS
// =============================================================================

/**
 * Every amino-acid symbol, with `*` for stop
 */
export const AMINO_ACIDS = "*ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/**
 * The 20 common amino acids, stop and X
 */
export const STRICT_AMINO_ACIDS = "*ACDEFGHIKLMNPQRSTVWXY";

/**
 * Ambiguous amino-acid codes
 */
export const AMBIGUOUS_AMINO_ACIDS = "BJZ";

/**
 * Residue used for codons that cannot be resolved to a single amino acid
 */
export const UNKNOWN_RESIDUE = "X";

/**
 * Residue used for stop codons
 */
export const STOP_RESIDUE = "*";

/**
 * Residue a start codon translates to at the 5' end of a CDS
 */
export const START_RESIDUE = "M";

/**
 * What each ambiguous amino-acid code stands for
 */
export const AMBIGUOUS_AMINO_ACID_MAP: Readonly<Record<string, readonly string[]>> = {
  B: ["A", "D"],
  J: ["I", "L"],
  Z: ["E", "Q"],
};

/**
 * One-letter to three-letter amino-acid abbreviations, including the
 * ambiguous codes, selenocysteine and pyrrolysine
 */
export const AMINO_ACID_ABBREVIATIONS: Readonly<Record<string, string>> = {
  A: "Ala",
  B: "Asx",
  C: "Cys",
  D: "Asp",
  E: "Glu",
  F: "Phe",
  G: "Gly",
  H: "His",
  I: "Ile",
  J: "Xle",
  K: "Lys",
  L: "Leu",
  M: "Met",
  N: "Asn",
  O: "Pyl",
  P: "Pro",
  Q: "Gln",
  R: "Arg",
  S: "Ser",
  T: "Thr",
  U: "Sec",
  V: "Val",
  W: "Trp",
  X: "Xaa",
  Y: "Tyr",
  Z: "Glx",
};

/**
 * Whether a symbol is a single amino-acid residue (case-insensitive)
 */
export function isResidue(symbol: string): boolean {
  return symbol.length === 1 && AMINO_ACIDS.includes(symbol.toUpperCase());
}

// =============================================================================
// CLEAN SEQUENCES
// =============================================================================

/**
 * Branded type for a sequence that has been through {@link cleanDNA}:
 * uppercase, no U, only symbols from {@link CODON_SYMBOLS}
 */
export type CleanDNA = string & {
  readonly __brand: "CleanDNA";
};

const CLEAN_PATTERN = /^[ABCDGHKMNRSTVWY]*$/;
const HEADER_LINE = /^[ \t]*>.*$/gm;
const NOT_NUCLEOTIDE = /[^ABCDGHKMNRSTVWY]+/g;

/**
 * Check that a string is already a clean sequence
 */
export function isCleanDNA(sequence: string): sequence is CleanDNA {
  return CLEAN_PATTERN.test(sequence);
}

/** Brand a string built only from clean symbols */
function asCleanDNA(sequence: string): CleanDNA {
  return sequence as CleanDNA;
}

/**
 * Clean a raw nucleotide sequence for scanning.
 *
 * Drops header lines starting with `>`, uppercases, folds U to T, and
 * deletes whitespace and every other symbol outside {@link NUCLEOTIDES}.
 * Invalid symbols are dropped silently. Cleaning a clean sequence returns
 * it unchanged.
 *
 * @example
 * ```typescript
 * cleanDNA("act tag cta");            // 'ACTTAGCTA'
 * cleanDNA(">some mRNA\nacugauauag"); // 'ACTGATATAG'
 * ```
 */
export function cleanDNA(raw: string): CleanDNA {
  return asCleanDNA(
    raw.replace(HEADER_LINE, "").toUpperCase().replace(/U/g, "T").replace(NOT_NUCLEOTIDE, "")
  );
}

/**
 * Clean a sequence, or with `sanitized` only check that it is already clean
 *
 * @throws {ValidationError} When a sequence marked as sanitized is not clean
 */
export function prepareSequence(sequence: string, sanitized: boolean = false): CleanDNA {
  if (!sanitized) return cleanDNA(sequence);
  if (isCleanDNA(sequence)) return sequence;

  throw new ValidationError(
    "Sequence marked as sanitized contains symbols a clean sequence cannot",
    ERROR_SUGGESTIONS.INVALID_NUCLEOTIDE
  );
}

/**
 * Generate a random concrete DNA sequence
 *
 * @param length - Number of bases (default: 100)
 * @param random - Source of uniform numbers in [0, 1) (default: Math.random)
 */
export function randomDNA(length: number = 100, random: () => number = Math.random): CleanDNA {
  if (!Number.isInteger(length) || length < 0) {
    throw new ValidationError(`Length must be a non-negative integer, got ${length}`);
  }

  let sequence = "";
  for (let i = 0; i < length; i++) {
    sequence += CONCRETE_NUCLEOTIDES[Math.floor(random() * 4)] ?? "A";
  }
  return asCleanDNA(sequence);
}
