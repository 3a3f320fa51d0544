/**
 * FrameScanner - longest ORF/CDS search and stop-free frame screening
 *
 * Each search keeps, per strand, the open boundary of each of the three
 * frames and walks the start/stop codons of the sequence left to right.
 * Reverse-strand hits are found in forward coordinates by matching the
 * reverse complement of each codon, so every returned region is a
 * half-open `[lower, upper)` on the input sequence.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import {
  type CdsConfig,
  CdsConfigSchema,
  type FindOptions,
  FindOptionsSchema,
  FRAME_LABELS,
  type FrameLabel,
  type NonstopConfig,
  NonstopConfigSchema,
  type ReadingStrand,
  type Region,
  type SearchConfig,
  SearchConfigSchema,
  assertStrandOption,
  searchStrands,
} from "../types";
import { type CleanDNA, prepareSequence } from "./core/alphabet";
import { getTranslationTable, type TranslationTable } from "./core/codon-table";
import { resolveBounds } from "./core/coordinates";
import { type CodonMatcher, type MatcherCache, sharedMatcherCache } from "./core/pattern-matcher";

const SEARCH_STRANDS = [-1, 0, 1] as const;
const READING_STRANDS = [-1, 1] as const;

/**
 * Per-frame open boundaries, indexed by `(position - lower) % 3`
 */
type FrameBounds = [number | undefined, number | undefined, number | undefined];

/**
 * Scanner bound to one translation table
 *
 * @example
 * ```typescript
 * const scanner = new FrameScanner();
 * scanner.getORF("TAGAAATAG");              // { strand: -1, lower: 0, upper: 9 }
 * scanner.getCDS("ATGAAATAG", { strand: 1 }); // { strand: 1, lower: 0, upper: 9 }
 * scanner.nonstop("TACGTTGGTTAAGTT");       // [2, 3, -1, -3]
 * ```
 */
export class FrameScanner {
  constructor(
    readonly table: TranslationTable = getTranslationTable(),
    private readonly matchers: MatcherCache = sharedMatcherCache
  ) {}

  /**
   * Matcher for a residue, `start`, `lower` or `upper` on a strand
   */
  matcher(residue: string, strand: ReadingStrand = 1): CodonMatcher {
    return this.matchers.get(this.table, residue, strand);
  }

  /**
   * Longest stop-to-stop span within the bounds.
   *
   * A forward ORF ends after its stop codon; a reverse ORF starts at the
   * left edge of the reverse-complemented stop. The bounds themselves close
   * frames that run off the end. Only a strictly longer span replaces the
   * current best, so the first one found wins ties.
   *
   * @returns The region, or `undefined` when nothing longer than 0 exists
   * @throws {StrandError} For a strand outside -1, 0, 1
   * @throws {CoordinateError} For bounds outside the cleaned sequence
   */
  getORF(sequence: string, config: SearchConfig = {}): Region | undefined {
    assertStrandOption(config, SEARCH_STRANDS);
    const options = SearchConfigSchema(config);
    if (options instanceof type.errors) {
      throw new ValidationError(`Invalid ORF search options: ${options.summary}`);
    }

    const seq = prepareSequence(sequence, options.sanitized);
    const { lower, upper } = resolveBounds(seq.length, options.lower, options.upper);

    let best: Region = { strand: 0, lower, upper: lower };

    for (const strand of searchStrands(options.strand ?? 0)) {
      const lowers: FrameBounds = [lower, lower + 1, lower + 2];
      const width = strand === 1 ? 3 : 0;

      const close = (boundary: number): void => {
        const frame = frameOf(boundary, lower);
        const open = lowers[frame] ?? boundary;
        if (boundary - open > best.upper - best.lower) {
          best = { strand, lower: open, upper: boundary };
        }
        lowers[frame] = boundary;
      };

      for (const position of this.matcher("*", strand).positions(seq, lower, upper)) {
        const boundary = position + width;
        if (boundary > upper) break;
        close(boundary);
      }

      for (let i = 0; i < 3; i++) {
        const boundary = upper - i;
        if (boundary < lower) continue;
        close(boundary);
      }
    }

    return best.upper > best.lower ? best : undefined;
  }

  /**
   * Longest start-to-stop span within the bounds.
   *
   * `strict` decides which frames may be open before a start codon is seen
   * and whether a span may run off the upper bound:
   *
   * | strict | strand 1 open at `lower` | strand 1 runs off `upper` | strand -1 open at `lower` | strand -1 runs off `upper` |
   * |--------|-----|-----|-----|-----|
   * | 0      | yes | yes | yes | yes |
   * | 1      | no  | yes | yes | no  |
   * | 2      | no  | no  | no  | no  |
   *
   * On strand 1 a start opens a frame only if it is closed, and a stop
   * closes it. On strand -1 every stop moves the frame's open boundary and
   * every start is a candidate end.
   *
   * @returns The region, or `undefined` when no span was found
   */
  getCDS(sequence: string, config: CdsConfig = {}): Region | undefined {
    assertStrandOption(config, SEARCH_STRANDS);
    const options = CdsConfigSchema(config);
    if (options instanceof type.errors) {
      throw new ValidationError(`Invalid CDS search options: ${options.summary}`);
    }

    const seq = prepareSequence(sequence, options.sanitized);
    const { lower, upper } = resolveBounds(seq.length, options.lower, options.upper);
    const strict = options.strict ?? 1;

    const best: { region?: Region; length: number } = { length: -1 };

    for (const strand of searchStrands(options.strand ?? 0)) {
      const lowerMatcher = this.matcher("lower", strand);
      const upperMatcher = this.matcher("upper", strand);

      const needsStart = (strand === 1 && strict !== 0) || (strand === -1 && strict === 2);
      const lowers: FrameBounds = needsStart
        ? [undefined, undefined, undefined]
        : [lower, lower + 1, lower + 2];

      const close = (boundary: number): void => {
        const frame = frameOf(boundary, lower);
        const open = lowers[frame];
        if (open === undefined) return;
        if (boundary - open > best.length) {
          best.region = { strand, lower: open, upper: boundary };
          best.length = boundary - open;
        }
        if (strand === 1) lowers[frame] = undefined;
      };

      for (let position = lower; position + 3 <= seq.length; position++) {
        const opens = lowerMatcher.matchesAt(seq, position);
        if (!opens && !upperMatcher.matchesAt(seq, position)) continue;
        if (position > upper) break;

        if (opens) {
          const frame = frameOf(position, lower);
          if (strand === -1 || lowers[frame] === undefined) {
            lowers[frame] = position;
          }
          continue;
        }

        const boundary = position + 3;
        if (boundary > upper) break;
        close(boundary);
      }

      const runsOff = strict !== 2 && (strand === 1 || strict === 0);
      if (runsOff) {
        for (let i = 0; i < 3; i++) {
          const boundary = upper - i;
          if (boundary < lower) continue;
          close(boundary);
        }
      }
    }

    return best.length > 0 ? best.region : undefined;
  }

  /**
   * Frames whose whole length, from the frame offset to the last complete
   * codon, holds no stop codon. Labels 1, 2, 3 are forward offsets 0, 1, 2;
   * -1, -2, -3 the same offsets from the 3' end of the sequence.
   *
   * @example
   * ```typescript
   * scanner.nonstop("TACGTTGGTTAAGTT");              // [2, 3, -1, -3]
   * scanner.nonstop("TACGTTGGTTAAGTT", { strand: -1 }); // [-1, -3]
   * ```
   */
  nonstop(sequence: string, config: NonstopConfig = {}): FrameLabel[] {
    assertStrandOption(config, SEARCH_STRANDS);
    const options = NonstopConfigSchema(config);
    if (options instanceof type.errors) {
      throw new ValidationError(`Invalid nonstop options: ${options.summary}`);
    }

    const seq = prepareSequence(sequence, options.sanitized);
    const strand = options.strand ?? 0;
    const strands: readonly ReadingStrand[] = strand === 0 ? [1, -1] : [strand];
    const open: FrameLabel[] = [];

    for (const current of strands) {
      const blocked = [false, false, false];

      for (const position of this.matcher("*", current).positions(seq)) {
        const offset = current === 1 ? position : seq.length - position - 3;
        blocked[offset % 3] = true;
      }

      const labels = FRAME_LABELS.filter((label) => Math.sign(label) === current);
      labels.forEach((label, frame) => {
        if (!blocked[frame]) open.push(label);
      });
    }

    return open;
  }

  /**
   * Start of every codon of a residue (or `start`, `lower`, `upper`) on a
   * strand, overlapping matches included
   *
   * @example
   * ```typescript
   * scanner.find("ATGATGA", "M");             // [0, 3]
   * scanner.find("TCATCA", "*", { strand: -1 }); // [0, 3]
   * ```
   */
  find(sequence: string, residue: string, config: FindOptions = {}): number[] {
    assertStrandOption(config, READING_STRANDS);
    const options = FindOptionsSchema(config);
    if (options instanceof type.errors) {
      throw new ValidationError(`Invalid find options: ${options.summary}`);
    }

    const seq: CleanDNA = prepareSequence(sequence, options.sanitized);
    return this.matcher(residue, options.strand ?? 1).positions(seq);
  }
}

function frameOf(position: number, lower: number): 0 | 1 | 2 {
  const frame = (position - lower) % 3;
  return frame === 1 ? 1 : frame === 2 ? 2 : 0;
}
