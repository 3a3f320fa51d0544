/**
 * Core type definitions for translation and reading-frame search
 *
 * Regions are half-open, 0-based intervals `[lower, upper)` with a strand
 * sign. Options objects are plain data: each one has an interface for
 * callers and an arktype schema that every public operation runs before it
 * touches the sequence.
 */

import { type } from "arktype";
import { StrandError } from "./errors";

// =============================================================================
// STRANDS, FRAMES AND RESIDUES
// =============================================================================

/**
 * Strand sign: `1` forward, `-1` reverse complement, `0` both/unknown.
 *
 * `0` is a search-scope flag; concrete regions only carry it when they are a
 * single strandless point.
 */
export type Strand = -1 | 0 | 1;

/**
 * Strand that a codon is actually read on
 */
export type ReadingStrand = -1 | 1;

/**
 * Frame label: 1, 2, 3 are forward offsets 0, 1, 2; negatives are the same
 * offsets on the reverse complement
 */
export type FrameLabel = 1 | 2 | 3 | -1 | -2 | -3;

/**
 * Frame labels in the order they are reported
 */
export const FRAME_LABELS: readonly FrameLabel[] = [1, 2, 3, -1, -2, -3];

/**
 * Offset of the next complete codon from the start of a partial location
 */
export type Phase = 0 | 1 | 2;

/**
 * getCDS strictness.
 *
 * - `0`: every frame is open at the scan's lower bound
 * - `1`: forward CDSs need a real start but may run off the upper bound
 * - `2`: only start...stop pairs inside the bounds count
 */
export type StrictLevel = 0 | 1 | 2;

/**
 * Pseudo-residues accepted wherever a residue selects codons.
 *
 * `lower` and `upper` name the codon that bounds a CDS on that side of a
 * strand: start/stop on `1`, stop/start on `-1`.
 */
export type SpecialResidue = "start" | "lower" | "upper";

// =============================================================================
// REGIONS
// =============================================================================

/**
 * Half-open interval on a sequence
 */
export interface Region {
  readonly strand: Strand;
  /** 0-based, inclusive */
  readonly lower: number;
  /** 0-based, exclusive */
  readonly upper: number;
}

/**
 * Region tied to a named source sequence, with the phase of a partial feature
 */
export interface Location extends Region {
  readonly source: string;
  readonly phase: Phase;
}

/**
 * 1-based biological coordinates. `end5 > end3` on the reverse strand.
 */
export interface Ends53 {
  readonly end5: number;
  readonly end3: number;
}

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Options for getORF
 */
export interface SearchConfig {
  /** Strand to search; 0 searches both (default: 0) */
  strand?: Strand;
  /** Lower scan bound (default: 0) */
  lower?: number;
  /** Upper scan bound (default: sequence length) */
  upper?: number;
  /** Skip cleaning; the sequence must already be clean (default: false) */
  sanitized?: boolean;
}

/**
 * Options for getCDS
 */
export interface CdsConfig extends SearchConfig {
  /** Boundary strictness (default: 1) */
  strict?: StrictLevel;
}

/**
 * Options for nonstop
 */
export interface NonstopConfig {
  strand?: Strand;
  sanitized?: boolean;
}

/**
 * Options for translating a stretch of sequence
 */
export interface TranslateOptions {
  /** Strand to read (default: 1) */
  strand?: ReadingStrand;
  lower?: number;
  upper?: number;
  /** The 5' end is missing; do not translate a leading start codon as M */
  partial5?: boolean;
  sanitized?: boolean;
}

/**
 * Options for translating a region or a set of exons
 */
export interface RangeOptions {
  partial5?: boolean;
  sanitized?: boolean;
}

/**
 * Options for locating the codons of a residue
 */
export interface FindOptions {
  strand?: ReadingStrand;
  sanitized?: boolean;
}

/**
 * Options for translating a single codon
 */
export interface CodonOptions {
  strand?: ReadingStrand;
  /** Translate start codons as M */
  start?: boolean;
}

// =============================================================================
// SCHEMAS
// =============================================================================

const StrandSchema = type.enumerated(-1, 0, 1);
const ReadingStrandSchema = type.enumerated(-1, 1);

export const RegionSchema = type({
  strand: StrandSchema,
  lower: "number.integer >= 0",
  upper: "number.integer >= 0",
});

export const SearchConfigSchema = type({
  "strand?": StrandSchema,
  "lower?": "number.integer >= 0",
  "upper?": "number.integer >= 0",
  "sanitized?": "boolean",
});

export const CdsConfigSchema = type({
  "strand?": StrandSchema,
  "lower?": "number.integer >= 0",
  "upper?": "number.integer >= 0",
  "strict?": type.enumerated(0, 1, 2),
  "sanitized?": "boolean",
});

export const NonstopConfigSchema = type({
  "strand?": StrandSchema,
  "sanitized?": "boolean",
});

export const TranslateOptionsSchema = type({
  "strand?": ReadingStrandSchema,
  "lower?": "number.integer >= 0",
  "upper?": "number.integer >= 0",
  "partial5?": "boolean",
  "sanitized?": "boolean",
});

export const RangeOptionsSchema = type({
  "partial5?": "boolean",
  "sanitized?": "boolean",
});

export const FindOptionsSchema = type({
  "strand?": ReadingStrandSchema,
  "sanitized?": "boolean",
});

export const CodonOptionsSchema = type({
  "strand?": ReadingStrandSchema,
  "start?": "boolean",
});

// =============================================================================
// STRAND HELPERS
// =============================================================================

/**
 * Throw {@link StrandError} when an options object carries a strand outside
 * `accepted`. Runs ahead of schema validation so that a bad strand is
 * reported as a strand problem.
 */
export function assertStrandOption(options: object, accepted: readonly number[]): void {
  if (!("strand" in options)) return;
  const strand = options.strand;
  if (strand === undefined) return;
  if (typeof strand !== "number" || !accepted.includes(strand)) {
    throw new StrandError(strand, accepted);
  }
}

/**
 * Narrow a number to a {@link Strand}
 */
export function isStrand(value: number): value is Strand {
  return value === -1 || value === 0 || value === 1;
}

/**
 * Strands to visit for a search scope; both strands are searched reverse first
 */
export function searchStrands(strand: Strand): readonly ReadingStrand[] {
  if (strand === 0) return [-1, 1];
  return [strand];
}
