/**
 * Codon matchers
 *
 * A matcher answers "does a codon of this residue start here?" for one
 * residue on one strand, degenerate codons included. Matchers are built on
 * first request and memoized per translation table.
 *
 * @module pattern-matcher
 * @since v0.1.0
 */

import type { ReadingStrand } from "../../types";
import { type CodonKey, resolveResidue, type TranslationTable } from "./codon-table";

/**
 * Codon set of one residue on one strand
 */
export interface CodonMatcher {
  /** Uppercase residue or `start` after resolving `lower`/`upper` */
  readonly residue: CodonKey;
  readonly strand: ReadingStrand;
  /** Codons as they appear on the forward sequence, concrete first */
  readonly codons: readonly string[];
  /** Whether a matching codon occupies `[position, position + 3)` */
  matchesAt(sequence: string, position: number): boolean;
  /**
   * Start of every matching codon whose first base lies in `[from, to]`,
   * ascending. Matches may overlap.
   */
  positions(sequence: string, from?: number, to?: number): number[];
}

class CodonSetMatcher implements CodonMatcher {
  private readonly set: ReadonlySet<string>;

  constructor(
    readonly residue: CodonKey,
    readonly strand: ReadingStrand,
    readonly codons: readonly string[]
  ) {
    this.set = new Set(codons);
  }

  matchesAt(sequence: string, position: number): boolean {
    if (position < 0 || position + 3 > sequence.length) return false;
    return this.set.has(sequence.slice(position, position + 3));
  }

  positions(sequence: string, from: number = 0, to: number = sequence.length - 3): number[] {
    const found: number[] = [];
    const last = Math.min(to, sequence.length - 3);

    // One base at a time so overlapping codons are all reported
    for (let position = Math.max(0, from); position <= last; position++) {
      if (this.set.has(sequence.slice(position, position + 3))) {
        found.push(position);
      }
    }
    return found;
  }
}

/**
 * Append-only matcher store, keyed by table instance and (residue, strand)
 *
 * @example
 * ```typescript
 * const cache = new MatcherCache();
 * const stops = cache.get(getTranslationTable(1), "*", 1);
 * stops.positions("ATGTAAATAG"); // [3, 7]
 * ```
 */
export class MatcherCache {
  private readonly entries = new WeakMap<TranslationTable, Map<string, CodonMatcher>>();

  /**
   * Matcher for a residue, `start`, `lower` or `upper` on a strand
   *
   * @throws {ValidationError} For an unknown residue
   */
  get(table: TranslationTable, residue: string, strand: ReadingStrand): CodonMatcher {
    const key = resolveResidue(residue, strand);
    const cacheKey = `${strand}:${key}`;

    let matchers = this.entries.get(table);
    if (matchers === undefined) {
      matchers = new Map();
      this.entries.set(table, matchers);
    }

    const cached = matchers.get(cacheKey);
    if (cached !== undefined) return cached;

    const matcher = new CodonSetMatcher(key, strand, table.codons(key, strand));
    matchers.set(cacheKey, matcher);
    return matcher;
  }

  /**
   * Whether a matcher has been built for this table, residue and strand
   */
  has(table: TranslationTable, residue: string, strand: ReadingStrand): boolean {
    const key = resolveResidue(residue, strand);
    return this.entries.get(table)?.has(`${strand}:${key}`) ?? false;
  }
}

/**
 * Process-wide matcher cache used when no other is supplied
 */
export const sharedMatcherCache = new MatcherCache();
