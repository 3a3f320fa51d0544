/**
 * Core sequence manipulation operations
 *
 * Complement, reverse and reverse-complement with full IUPAC ambiguity
 * code support. Case is preserved; symbols without a complement pass
 * through unchanged.
 *
 * @module sequence-manipulation
 * @since v0.1.0
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * DNA complement mapping including IUPAC ambiguity codes
 */
const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
  U: "A", // RNA
  R: "Y",
  Y: "R", // Purines <-> Pyrimidines
  S: "S",
  W: "W", // Self-complementary
  K: "M",
  M: "K", // Keto <-> Amino
  B: "V",
  V: "B", // Not A <-> Not T
  D: "H",
  H: "D", // Not C <-> Not G
  N: "N",
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement a DNA sequence
 *
 * @example
 * ```typescript
 * complement("ATCG"); // 'TAGC'
 * complement("aRn");  // 'tYn'
 * ```
 */
export function complement(sequence: string): string {
  let result = "";

  for (const symbol of sequence) {
    const comp = DNA_COMPLEMENT_MAP[symbol.toUpperCase()];
    if (comp === undefined) {
      result += symbol;
    } else if (symbol === symbol.toLowerCase()) {
      result += comp.toLowerCase();
    } else {
      result += comp;
    }
  }

  return result;
}

/**
 * Reverse a sequence
 *
 * @example
 * ```typescript
 * reverse("ATCG"); // 'GCTA'
 * ```
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Reverse complement of a sequence, the strand read 5' to 3' on the
 * opposite side of the helix
 *
 * @example
 * ```typescript
 * reverseComplement("ATCG"); // 'CGAT'
 * reverseComplement("TAR");  // 'YTA'
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}
