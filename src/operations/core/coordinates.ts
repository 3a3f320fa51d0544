/**
 * Region arithmetic and coordinate conversion
 *
 * Internally every region is a half-open, 0-based interval `[lower, upper)`
 * with a strand sign. Biological coordinates are 1-based and inclusive,
 * written 5' end first, so a reverse-strand feature has `end5 > end3`.
 *
 * @module coordinates
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const region = fromE53(10, 3);  // { strand: -1, lower: 2, upper: 10 }
 * toE53(region);                  // { end5: 10, end3: 3 }
 * formatRegion(region);           // '[ 2          10 - ]'
 * ```
 */

import { type } from "arktype";
import { CoordinateError, ERROR_SUGGESTIONS, StrandError, ValidationError } from "../../errors";
import type { Ends53, Location, Phase, Region, Strand } from "../../types";
import { isStrand } from "../../types";
import { reverseComplement } from "./sequence-manipulation";

// =============================================================================
// VALIDATION
// =============================================================================

function isCoordinate(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Resolve optional scan bounds against a sequence length
 *
 * @throws {CoordinateError} `INVALID_COORDINATES` when a bound is past the
 * end of the sequence or `upper < lower`
 *
 * @example
 * ```typescript
 * resolveBounds(12);        // { lower: 0, upper: 12 }
 * resolveBounds(12, 3);     // { lower: 3, upper: 12 }
 * resolveBounds(12, 3, 20); // throws
 * ```
 */
export function resolveBounds(
  length: number,
  lower: number = 0,
  upper: number = length
): { lower: number; upper: number } {
  if (!isCoordinate(lower) || !isCoordinate(upper)) {
    throw new CoordinateError(
      "Bounds must be non-negative integers",
      "INVALID_COORDINATES",
      lower,
      upper,
      ERROR_SUGGESTIONS.INVALID_REGION
    );
  }
  if (upper < lower) {
    throw new CoordinateError(
      `Upper bound ${upper} is less than lower bound ${lower}`,
      "INVALID_COORDINATES",
      lower,
      upper,
      ERROR_SUGGESTIONS.INVALID_REGION
    );
  }
  if (upper > length) {
    throw new CoordinateError(
      `Bounds exceed sequence length ${length}`,
      "INVALID_COORDINATES",
      lower,
      upper,
      ERROR_SUGGESTIONS.INVALID_REGION
    );
  }
  return { lower, upper };
}

/**
 * Check that a region fits a sequence of `length` symbols
 *
 * @throws {CoordinateError} `INVALID_COORDINATES` for an inverted region,
 * `OUT_OF_RANGE` when it extends past the end
 */
export function assertRegionFits(region: Region, length: number): void {
  if (region.upper < region.lower) {
    throw new CoordinateError(
      `Upper bound ${region.upper} is less than lower bound ${region.lower}`,
      "INVALID_COORDINATES",
      region.lower,
      region.upper,
      ERROR_SUGGESTIONS.INVALID_REGION
    );
  }
  if (region.upper > length) {
    throw new CoordinateError(
      `Region exceeds sequence length ${length}`,
      "OUT_OF_RANGE",
      region.lower,
      region.upper,
      ERROR_SUGGESTIONS.INVALID_REGION
    );
  }
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

/**
 * Create a validated region
 *
 * @throws {CoordinateError} For negative, fractional or inverted bounds
 * @throws {StrandError} For a strand outside -1, 0, 1
 */
export function createRegion(lower: number, upper: number, strand: number = 0): Region {
  if (!isStrand(strand)) {
    throw new StrandError(strand, [-1, 0, 1]);
  }
  resolveBounds(Number.POSITIVE_INFINITY, lower, upper);
  return { strand, lower, upper };
}

/**
 * Convert 1-based 5'/3' ends to a region.
 *
 * `end5 < end3` is the forward strand, `end5 > end3` the reverse strand.
 * Equal ends give a single strandless base.
 *
 * @throws {CoordinateError} Unless both ends are positive integers
 *
 * @example
 * ```typescript
 * fromE53(3, 7); // { strand: 1, lower: 2, upper: 7 }
 * fromE53(7, 3); // { strand: -1, lower: 2, upper: 7 }
 * fromE53(4, 4); // { strand: 0, lower: 3, upper: 4 }
 * ```
 */
export function fromE53(end5: number, end3: number): Region {
  if (!Number.isInteger(end5) || !Number.isInteger(end3) || end5 < 1 || end3 < 1) {
    throw new CoordinateError(
      `5'/3' ends must be positive integers, got ${end5} and ${end3}`,
      "INVALID_COORDINATES"
    );
  }
  if (end5 < end3) return { strand: 1, lower: end5 - 1, upper: end3 };
  if (end3 < end5) return { strand: -1, lower: end3 - 1, upper: end5 };
  return { strand: 0, lower: end5 - 1, upper: end5 };
}

/**
 * Convert a region to 1-based 5'/3' ends
 */
export function toE53(region: Region): Ends53 {
  if (region.strand === -1) {
    return { end5: region.upper, end3: region.lower + 1 };
  }
  return { end5: region.lower + 1, end3: region.upper };
}

/**
 * Location on a named source sequence from 5'/3' ends
 */
export function locationFromE53(
  source: string,
  end5: number,
  end3: number,
  phase: Phase = 0
): Location {
  return { source, phase, ...fromE53(end5, end3) };
}

/**
 * Region of `length` symbols ending at `upper`
 *
 * @throws {CoordinateError} When `length` is negative or larger than `upper`
 */
export function regionFromUpperLength(upper: number, length: number, strand: Strand = 0): Region {
  return createRegion(upper - length, upper, strand);
}

// =============================================================================
// MEASUREMENT AND COMPARISON
// =============================================================================

export function regionLength(region: Region): number {
  return region.upper - region.lower;
}

/**
 * Leftover bases past the last whole codon
 */
export function regionPhase(region: Region): Phase {
  const phase = regionLength(region) % 3;
  return phase === 1 ? 1 : phase === 2 ? 2 : 0;
}

/**
 * Whether a point lies within the region, both ends inclusive
 */
export function contains(region: Region, point: number): boolean {
  return region.lower <= point && point <= region.upper;
}

/**
 * Whether two regions share at least one base
 */
export function overlaps(a: Region, b: Region): boolean {
  return a.lower < b.upper && a.upper > b.lower;
}

/**
 * Whether `outer` covers all of `inner`
 */
export function encloses(outer: Region, inner: Region): boolean {
  return outer.lower <= inner.lower && outer.upper >= inner.upper;
}

export function regionsEqual(a: Region, b: Region): boolean {
  return a.lower === b.lower && a.upper === b.upper && a.strand === b.strand;
}

/**
 * Shared part of two regions. The strand survives only when both agree.
 *
 * @example
 * ```typescript
 * intersection({ strand: 1, lower: 0, upper: 9 }, { strand: -1, lower: 6, upper: 12 });
 * // { strand: 0, lower: 6, upper: 9 }
 * ```
 */
export function intersection(a: Region, b: Region): Region | undefined {
  if (!overlaps(a, b)) return undefined;
  return {
    strand: a.strand === b.strand ? a.strand : 0,
    lower: Math.max(a.lower, b.lower),
    upper: Math.min(a.upper, b.upper),
  };
}

/**
 * Grow a region by `lower` bases on the left and `upper` bases on the
 * right; negative amounts shrink it
 *
 * @throws {CoordinateError} When the result would be negative or inverted
 */
export function extendRegion(region: Region, lower: number, upper: number = lower): Region {
  return createRegion(region.lower - lower, region.upper + upper, region.strand);
}

// =============================================================================
// SEQUENCE ACCESS
// =============================================================================

/**
 * Bases under a region, exactly as they appear on the forward strand
 *
 * @throws {CoordinateError} `OUT_OF_RANGE` when the region does not fit
 */
export function extractSequence(sequence: string, region: Region): string {
  assertRegionFits(region, sequence.length);
  return sequence.slice(region.lower, region.upper);
}

/**
 * Bases under a region read 5' to 3' on its own strand
 */
export function extractStrandSequence(sequence: string, region: Region): string {
  const bases = extractSequence(sequence, region);
  return region.strand === -1 ? reverseComplement(bases) : bases;
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Single-character strand symbol: `+`, `-`, `.` for strandless, `?` for
 * anything else
 */
export function strandSymbol(strand: number): string {
  switch (strand) {
    case 1:
      return "+";
    case -1:
      return "-";
    case 0:
      return ".";
    default:
      return "?";
  }
}

/**
 * Region display styles
 */
export const RegionFormat = {
  /** `[ lower upper strand ]` */
  LUS: "lus",
  /** `<5' end5 end3 3'>` */
  E53: "53",
} as const;

export type RegionFormat = (typeof RegionFormat)[keyof typeof RegionFormat];

export interface FormatOptions {
  method?: RegionFormat;
  /** Minimum width of each number (default: 6) */
  width?: number;
}

const FormatOptionsSchema = type({
  "method?": "'lus' | '53'",
  "width?": "number.integer >= 0",
});

/**
 * Render a region for display. The first number is left-justified and the
 * second right-justified, each padded to `width`.
 *
 * @example
 * ```typescript
 * formatRegion({ strand: 1, lower: 0, upper: 9 });
 * // '[ 0           9 + ]'
 * formatRegion({ strand: 1, lower: 0, upper: 9 }, { method: "53", width: 3 });
 * // "<5' 1     9 3'>"
 * ```
 */
export function formatRegion(region: Region, options: FormatOptions = {}): string {
  const validated = FormatOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid format options: ${validated.summary}`);
  }
  const width = validated.width ?? 6;

  if (validated.method === RegionFormat.E53) {
    const { end5, end3 } = toE53(region);
    return `<5' ${String(end5).padEnd(width)} ${String(end3).padStart(width)} 3'>`;
  }

  const lower = String(region.lower).padEnd(width);
  const upper = String(region.upper).padStart(width);
  return `[ ${lower} ${upper} ${strandSymbol(region.strand)} ]`;
}
