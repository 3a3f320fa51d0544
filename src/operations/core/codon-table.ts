/**
 * Translation tables
 *
 * A {@link TranslationTable} is built once from a {@link GeneticCodeDefinition}
 * and answers every codon question the scanner and translator ask, on both
 * strands and for degenerate codons.
 *
 * @key-concepts
 * 1. **Forward table**: 64 residues indexed over {A,C,G,T}, `AAA = 0`,
 *    `AAC = 1`, ... `TTT = 63`.
 * 2. **Reverse-complement tables**: a codon read on strand -1 is looked up
 *    by reverse-complementing it, so `CTA` on strand -1 is the `TAG` stop.
 * 3. **Degenerate resolution**: a codon with IUPAC codes encodes a residue
 *    only when every concrete codon it expands to encodes that residue; it
 *    is a start only when every expansion is a start. Anything else is
 *    ambiguous and translates to `X`.
 *
 * @module codon-table
 * @since v0.1.0
 */

import { type } from "arktype";
import { ERROR_SUGGESTIONS, GeneticCodeError, ValidationError } from "../../errors";
import type { ReadingStrand, SpecialResidue } from "../../types";
import {
  CODON_SYMBOLS,
  CONCRETE_NUCLEOTIDES,
  START_RESIDUE,
  STOP_RESIDUE,
  UNKNOWN_RESIDUE,
  expandCodon,
  isDegenerate,
  isResidue,
} from "./alphabet";
import {
  GeneticCode,
  type GeneticCodeDefinition,
  geneticCodeIds,
  getGeneticCode,
} from "./genetic-codes";
import { reverseComplement } from "./sequence-manipulation";

// =============================================================================
// CODON INDEXING
// =============================================================================

/**
 * Index of a concrete codon in the forward table, or `undefined` when the
 * codon is not three concrete bases
 *
 * @example
 * ```typescript
 * codonIndex("AAA"); // 0
 * codonIndex("TTT"); // 63
 * codonIndex("TAR"); // undefined
 * ```
 */
export function codonIndex(codon: string): number | undefined {
  if (codon.length !== 3) return undefined;
  let index = 0;
  for (const base of codon.toUpperCase()) {
    const value = CONCRETE_NUCLEOTIDES.indexOf(base);
    if (value < 0) return undefined;
    index = index * 4 + value;
  }
  return index;
}

/**
 * Concrete codon at a forward-table index
 */
export function codonAt(index: number): string {
  return (
    (CONCRETE_NUCLEOTIDES[(index >> 4) & 3] ?? "") +
    (CONCRETE_NUCLEOTIDES[(index >> 2) & 3] ?? "") +
    (CONCRETE_NUCLEOTIDES[index & 3] ?? "")
  );
}

const CONCRETE_CODONS: readonly string[] = Array.from({ length: 64 }, (_, i) => codonAt(i));

// Concrete codons in index order, then every degenerate codon over CODON_SYMBOLS
const ALL_CODONS: readonly string[] = (() => {
  const degenerate: string[] = [];
  for (const first of CODON_SYMBOLS) {
    for (const second of CODON_SYMBOLS) {
      for (const third of CODON_SYMBOLS) {
        const codon = first + second + third;
        if (isDegenerate(codon)) degenerate.push(codon);
      }
    }
  }
  return [...CONCRETE_CODONS, ...degenerate];
})();

// =============================================================================
// RESIDUE ALIASES
// =============================================================================

/**
 * Key under which a residue's codons are stored: an uppercase residue, or
 * `"start"` for start codons
 */
export type CodonKey = string;

/**
 * Resolve a residue or pseudo-residue to its codon key on a strand.
 *
 * `lower` is the start codon on strand 1 and the stop codon on strand -1;
 * `upper` is the reverse.
 *
 * @throws {ValidationError} For anything that is not a residue or one of
 * `start`, `lower`, `upper`
 */
export function resolveResidue(residue: string, strand: ReadingStrand): CodonKey {
  const special = residue.toLowerCase();
  if (isSpecialResidue(special)) {
    if (special === "start") return "start";
    const startSide = special === "lower" ? strand === 1 : strand === -1;
    return startSide ? "start" : STOP_RESIDUE;
  }
  if (isResidue(residue)) return residue.toUpperCase();

  throw new ValidationError(`Invalid residue: ${residue}`, ERROR_SUGGESTIONS.INVALID_RESIDUE);
}

function isSpecialResidue(value: string): value is SpecialResidue {
  return value === "start" || value === "lower" || value === "upper";
}

// =============================================================================
// TABLE VALIDATION
// =============================================================================

const GeneticCodeDefinitionSchema = type({
  id: "number.integer >= 0",
  name: "string",
  shortName: "string",
  codons: { "[string]": "string" },
  startCodons: "string[]",
});

function normalizeCodon(codon: string): string {
  return codon.toUpperCase().replace(/U/g, "T");
}

function invalidTable(message: string, tableId: number): GeneticCodeError {
  return new GeneticCodeError(message, "INVALID_TABLE", tableId, ERROR_SUGGESTIONS.INVALID_TABLE);
}

/**
 * Check a definition and return its forward residues in index order with
 * its normalized start codons
 */
function validateDefinition(definition: GeneticCodeDefinition): {
  forward: string[];
  starts: string[];
} {
  const validated = GeneticCodeDefinitionSchema(definition);
  if (validated instanceof type.errors) {
    throw new GeneticCodeError(
      `Invalid genetic code definition: ${validated.summary}`,
      "INVALID_TABLE",
      definition.id,
      ERROR_SUGGESTIONS.INVALID_TABLE
    );
  }

  const forward: string[] = new Array<string>(64).fill("");
  const seen = new Set<number>();

  for (const [rawCodon, rawResidue] of Object.entries(validated.codons)) {
    const index = codonIndex(normalizeCodon(rawCodon));
    if (index === undefined) {
      throw invalidTable(`Codon "${rawCodon}" is not three concrete bases`, validated.id);
    }
    if (seen.has(index)) {
      throw invalidTable(`Codon "${rawCodon}" is defined twice`, validated.id);
    }
    if (!isResidue(rawResidue)) {
      throw invalidTable(`Codon "${rawCodon}" maps to invalid residue "${rawResidue}"`, validated.id);
    }
    seen.add(index);
    forward[index] = rawResidue.toUpperCase();
  }

  if (seen.size !== 64) {
    const missing = CONCRETE_CODONS.filter((_, i) => !seen.has(i));
    throw invalidTable(
      `Genetic code defines ${seen.size} of 64 codons; missing ${missing.join(", ")}`,
      validated.id
    );
  }

  const starts: string[] = [];
  for (const rawStart of validated.startCodons) {
    const start = normalizeCodon(rawStart);
    if (codonIndex(start) === undefined) {
      throw invalidTable(`Start codon "${rawStart}" is not three concrete bases`, validated.id);
    }
    if (!starts.includes(start)) starts.push(start);
  }

  return { forward, starts };
}

// =============================================================================
// TRANSLATION TABLE
// =============================================================================

interface StrandTables {
  /** Codon (concrete or resolvable degenerate) to residue */
  readonly residues: ReadonlyMap<string, string>;
  /** Concrete and degenerate start codons */
  readonly starts: ReadonlySet<string>;
  /** Codon key to codons, concrete first */
  readonly byKey: ReadonlyMap<CodonKey, readonly string[]>;
}

/**
 * Codon lookups for one genetic code on both strands
 *
 * @example
 * ```typescript
 * const table = getTranslationTable(1);
 * table.residueOf("TAG");       // '*'
 * table.residueOf("CTA", -1);   // '*'
 * table.residueOf("NNN");       // undefined
 * table.codons("*");            // ['TAA', 'TAG', 'TGA', 'TAR', 'TRA']
 * table.translateCodon("TTG", { start: true }); // 'M'
 * ```
 */
export class TranslationTable {
  /** Residue of each concrete codon, indexed by {@link codonIndex} */
  readonly forward: readonly string[];
  /** Forward-strand concrete start codons, in definition order */
  readonly startCodons: readonly string[];

  private readonly plus: StrandTables;
  private readonly minus: StrandTables;

  private constructor(
    readonly id: number,
    readonly name: string,
    readonly shortName: string,
    forward: readonly string[],
    startCodons: readonly string[]
  ) {
    this.forward = Object.freeze([...forward]);
    this.startCodons = Object.freeze([...startCodons]);
    this.plus = this.buildStrand((codon) => codon);
    this.minus = this.buildStrand(reverseComplement);
  }

  /**
   * Build a table from a definition, built-in or custom
   *
   * @throws {GeneticCodeError} `INVALID_TABLE` unless the definition maps
   * all 64 concrete codons to residues and its start codons are concrete
   */
  static fromDefinition(definition: GeneticCodeDefinition): TranslationTable {
    const { forward, starts } = validateDefinition(definition);
    return new TranslationTable(
      definition.id,
      definition.name,
      definition.shortName,
      forward,
      starts
    );
  }

  /**
   * The table as a plain definition
   */
  toDefinition(): GeneticCodeDefinition {
    const codons: Record<string, string> = {};
    CONCRETE_CODONS.forEach((codon, i) => {
      codons[codon] = this.forward[i] ?? UNKNOWN_RESIDUE;
    });
    return {
      id: this.id,
      name: this.name,
      shortName: this.shortName,
      codons,
      startCodons: [...this.startCodons],
    };
  }

  /**
   * Residue a codon encodes when read on `strand`, or `undefined` when the
   * codon is ambiguous or not a codon
   */
  residueOf(codon: string, strand: ReadingStrand = 1): string | undefined {
    return this.tables(strand).residues.get(normalizeCodon(codon));
  }

  /**
   * Whether a codon is a start codon when read on `strand`
   */
  isStart(codon: string, strand: ReadingStrand = 1): boolean {
    return this.tables(strand).starts.has(normalizeCodon(codon));
  }

  /**
   * Codons of a residue (or `start`, `lower`, `upper`) as they appear on
   * `strand`. Concrete codons come first. Returns a fresh array.
   *
   * @throws {ValidationError} For an unknown residue
   */
  codons(residue: string, strand: ReadingStrand = 1): string[] {
    return [...(this.tables(strand).byKey.get(resolveResidue(residue, strand)) ?? [])];
  }

  /**
   * Translate one codon. With `start`, a start codon becomes `M`.
   * Ambiguous codons become `X`.
   */
  translateCodon(codon: string, options: { strand?: ReadingStrand; start?: boolean } = {}): string {
    const strand = options.strand ?? 1;
    if (options.start === true && this.isStart(codon, strand)) {
      return START_RESIDUE;
    }
    return this.residueOf(codon, strand) ?? UNKNOWN_RESIDUE;
  }

  private tables(strand: ReadingStrand): StrandTables {
    return strand === -1 ? this.minus : this.plus;
  }

  /**
   * Resolve every codon as it reads on one strand; `toForward` maps a codon
   * as seen on that strand to the forward codon it stands for
   */
  private buildStrand(toForward: (codon: string) => string): StrandTables {
    const forwardStarts = new Set(this.startCodons);
    const residues = new Map<string, string>();
    const starts = new Set<string>();
    const byKey = new Map<CodonKey, string[]>();

    const add = (key: CodonKey, codon: string): void => {
      const list = byKey.get(key);
      if (list === undefined) {
        byKey.set(key, [codon]);
      } else {
        list.push(codon);
      }
    };

    for (const codon of ALL_CODONS) {
      const expansions = expandCodon(toForward(codon));
      const encoded = new Set<string>();
      let allStarts = true;

      for (const concrete of expansions) {
        const index = codonIndex(concrete);
        encoded.add(index === undefined ? UNKNOWN_RESIDUE : (this.forward[index] ?? UNKNOWN_RESIDUE));
        if (!forwardStarts.has(concrete)) allStarts = false;
      }

      const [residue] = encoded;
      if (encoded.size === 1 && residue !== undefined) {
        residues.set(codon, residue);
        add(residue, codon);
      }
      if (allStarts && expansions.length > 0) {
        starts.add(codon);
        add("start", codon);
      }
    }

    return { residues, starts, byKey };
  }
}

// =============================================================================
// TABLE CACHE
// =============================================================================

const tableCache = new Map<number, TranslationTable>();

/**
 * Translation table for an NCBI genetic code id, built on first use and
 * cached for the life of the process
 *
 * @throws {GeneticCodeError} `UNKNOWN_TABLE_ID` for an unregistered id
 *
 * @example
 * ```typescript
 * const standard = getTranslationTable();
 * const vertebrateMito = getTranslationTable(GeneticCode.VERTEBRATE_MITOCHONDRIAL);
 * vertebrateMito.residueOf("AGA"); // '*'
 * ```
 */
export function getTranslationTable(id: number = GeneticCode.STANDARD): TranslationTable {
  const cached = tableCache.get(id);
  if (cached !== undefined) return cached;

  const definition = getGeneticCode(id);
  if (definition === undefined) {
    throw GeneticCodeError.unknownId(id, geneticCodeIds());
  }

  // Fully built before it becomes visible to other callers
  const table = TranslationTable.fromDefinition(definition);
  tableCache.set(id, table);
  return table;
}

/**
 * Check if a codon is a start codon in a genetic code
 *
 * @example
 * ```typescript
 * isStartCodon("ATG");    // true
 * isStartCodon("TTG", 2); // false
 * ```
 */
export function isStartCodon(codon: string, id: number = GeneticCode.STANDARD): boolean {
  return getTranslationTable(id).isStart(codon);
}

/**
 * Check if a codon is a stop codon in a genetic code
 */
export function isStopCodon(codon: string, id: number = GeneticCode.STANDARD): boolean {
  return getTranslationTable(id).residueOf(codon) === STOP_RESIDUE;
}
