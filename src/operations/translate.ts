/**
 * Translator - nucleotide to protein translation
 *
 * Translates regions, whole sequences, spliced exons and all six frames
 * through one {@link TranslationTable}, and exposes the reading-frame
 * searches of its {@link FrameScanner}.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import {
  type CdsConfig,
  type CodonOptions,
  CodonOptionsSchema,
  type FindOptions,
  type FrameLabel,
  type NonstopConfig,
  type RangeOptions,
  RangeOptionsSchema,
  type ReadingStrand,
  type Region,
  RegionSchema,
  type SearchConfig,
  type TranslateOptions,
  TranslateOptionsSchema,
  assertStrandOption,
} from "../types";
import { START_RESIDUE, UNKNOWN_RESIDUE, prepareSequence } from "./core/alphabet";
import { GeneticCode, type GeneticCodeDefinition, parseNcbiTable } from "./core/genetic-codes";
import { TranslationTable, getTranslationTable } from "./core/codon-table";
import { assertRegionFits, extractSequence, resolveBounds } from "./core/coordinates";
import { type CodonMatcher, type MatcherCache, sharedMatcherCache } from "./core/pattern-matcher";
import { FrameScanner } from "./reading-frames";

/**
 * Raw translations of the six reading frames
 */
export type SixFrameTranslation = Record<"+1" | "+2" | "+3" | "-1" | "-2" | "-3", string>;

const REGION_STRANDS = [-1, 0, 1] as const;
const READING_STRANDS = [-1, 1] as const;

/**
 * Translator for one genetic code
 *
 * @example
 * ```typescript
 * const translator = Translator.fromId(1);
 * const cds = translator.getCDS(sequence);
 * if (cds !== undefined) {
 *   console.log(translator.translateRange(sequence, cds));
 * }
 *
 * translator.translate("CTGGCCTAA");                     // 'MA*'
 * translator.translate("CTGGCCTAA", { partial5: true }); // 'LA*'
 * ```
 */
export class Translator {
  readonly scanner: FrameScanner;

  constructor(
    readonly table: TranslationTable = getTranslationTable(),
    matchers: MatcherCache = sharedMatcherCache
  ) {
    this.scanner = new FrameScanner(table, matchers);
  }

  /**
   * Translator for a built-in NCBI genetic code
   *
   * @throws {GeneticCodeError} `UNKNOWN_TABLE_ID` for an unregistered id
   */
  static fromId(id: number = GeneticCode.STANDARD): Translator {
    return new Translator(getTranslationTable(id));
  }

  /**
   * Translator for a custom genetic code
   *
   * @throws {GeneticCodeError} `INVALID_TABLE` for an incomplete definition
   */
  static fromDefinition(definition: GeneticCodeDefinition): Translator {
    return new Translator(TranslationTable.fromDefinition(definition));
  }

  /**
   * Translator for a table written in NCBI `gc.prt` notation
   *
   * @throws {ParseError} When the table text cannot be parsed
   */
  static fromNcbi(text: string): Translator {
    return Translator.fromDefinition(parseNcbiTable(text));
  }

  // =============================================================================
  // TRANSLATION
  // =============================================================================

  /**
   * Translate the bases of a region.
   *
   * Strand -1 reads the region right to left through the reverse-complement
   * table; strand 0 and 1 read it left to right. Unless `partial5` is set, a
   * start codon in the first position translates to `M`. Bases that do not
   * fill a final codon are ignored and ambiguous codons become `X`.
   *
   * @throws {CoordinateError} `OUT_OF_RANGE` when the region does not fit
   * the cleaned sequence
   */
  translateRange(sequence: string, region: Region, options: RangeOptions = {}): string {
    assertStrandOption(region, REGION_STRANDS);
    const checkedRegion = RegionSchema(region);
    if (checkedRegion instanceof type.errors) {
      throw new ValidationError(`Invalid region: ${checkedRegion.summary}`);
    }
    const checked = RangeOptionsSchema(options);
    if (checked instanceof type.errors) {
      throw new ValidationError(`Invalid translation options: ${checked.summary}`);
    }

    const seq = prepareSequence(sequence, checked.sanitized);
    assertRegionFits(checkedRegion, seq.length);

    const strand: ReadingStrand = checkedRegion.strand === -1 ? -1 : 1;
    return this.readCodons(
      seq,
      checkedRegion.lower,
      checkedRegion.upper,
      strand,
      checked.partial5 ?? false
    );
  }

  /**
   * Translate a sequence, or the part of it between `lower` and `upper`
   *
   * @example
   * ```typescript
   * translator.translate("ATGAAATAG");                    // 'MK*'
   * translator.translate("CTATTTCAT", { strand: -1 });    // 'MK*'
   * ```
   */
  translate(sequence: string, options: TranslateOptions = {}): string {
    assertStrandOption(options, READING_STRANDS);
    const checked = TranslateOptionsSchema(options);
    if (checked instanceof type.errors) {
      throw new ValidationError(`Invalid translation options: ${checked.summary}`);
    }

    const seq = prepareSequence(sequence, checked.sanitized);
    const { lower, upper } = resolveBounds(seq.length, checked.lower, checked.upper);
    return this.readCodons(seq, lower, upper, checked.strand ?? 1, checked.partial5 ?? false);
  }

  /**
   * Translate one codon. With `start`, start codons become `M`.
   */
  translateCodon(codon: string, options: CodonOptions = {}): string {
    assertStrandOption(options, READING_STRANDS);
    const checked = CodonOptionsSchema(options);
    if (checked instanceof type.errors) {
      throw new ValidationError(`Invalid codon options: ${checked.summary}`);
    }
    return this.table.translateCodon(codon, checked);
  }

  /**
   * Raw translation of all six frames, without start-codon substitution.
   * Frame `-n` begins `n - 1` bases from the 3' end of the sequence.
   */
  translateSixFrames(sequence: string, options: { sanitized?: boolean } = {}): SixFrameTranslation {
    const checked = RangeOptionsSchema(options);
    if (checked instanceof type.errors) {
      throw new ValidationError(`Invalid translation options: ${checked.summary}`);
    }

    const seq = prepareSequence(sequence, checked.sanitized);
    const length = seq.length;
    const forward = (offset: number): string =>
      offset > length ? "" : this.readCodons(seq, offset, length, 1, true);
    const reverse = (offset: number): string =>
      offset > length ? "" : this.readCodons(seq, 0, length - offset, -1, true);

    return {
      "+1": forward(0),
      "+2": forward(1),
      "+3": forward(2),
      "-1": reverse(0),
      "-2": reverse(1),
      "-3": reverse(2),
    };
  }

  /**
   * Splice exons and translate them as one coding sequence.
   *
   * Exons must share a strand. They are joined in coordinate order; on
   * strand -1 the joined bases are read as their reverse complement.
   *
   * @throws {ValidationError} When the exons are on different strands
   * @throws {CoordinateError} When an exon does not fit the sequence
   */
  translateExons(
    sequence: string,
    exons: readonly Region[],
    options: RangeOptions = {}
  ): string {
    const checked = RangeOptionsSchema(options);
    if (checked instanceof type.errors) {
      throw new ValidationError(`Invalid translation options: ${checked.summary}`);
    }
    for (const exon of exons) {
      assertStrandOption(exon, REGION_STRANDS);
      const checkedExon = RegionSchema(exon);
      if (checkedExon instanceof type.errors) {
        throw new ValidationError(`Invalid exon: ${checkedExon.summary}`);
      }
    }

    const strands = new Set(exons.map((exon) => exon.strand));
    if (strands.size > 1) {
      throw new ValidationError(
        "Exons must all be on the same strand",
        `Strands: ${Array.from(strands).join(", ")}`
      );
    }

    const seq = prepareSequence(sequence, checked.sanitized);
    const ordered = [...exons].sort((a, b) => a.lower - b.lower || a.upper - b.upper);
    const spliced = ordered
      .map((exon) => extractSequence(seq, exon))
      .join("");

    const strand: ReadingStrand = ordered[0]?.strand === -1 ? -1 : 1;
    return this.readCodons(spliced, 0, spliced.length, strand, checked.partial5 ?? false);
  }

  /**
   * Read whole codons of `[lower, upper)`; strand -1 reads from `upper` down
   */
  private readCodons(
    seq: string,
    lower: number,
    upper: number,
    strand: ReadingStrand,
    partial5: boolean
  ): string {
    let protein = "";
    const count = Math.floor((upper - lower) / 3);

    for (let i = 0; i < count; i++) {
      const start = strand === 1 ? lower + i * 3 : upper - (i + 1) * 3;
      const codon = seq.slice(start, start + 3);

      if (i === 0 && !partial5 && this.table.isStart(codon, strand)) {
        protein += START_RESIDUE;
      } else {
        protein += this.table.residueOf(codon, strand) ?? UNKNOWN_RESIDUE;
      }
    }

    return protein;
  }

  // =============================================================================
  // TABLE AND SCANNER ACCESS
  // =============================================================================

  /**
   * Codons of a residue (or `start`, `lower`, `upper`) on a strand
   */
  codons(residue: string, strand: ReadingStrand = 1): string[] {
    return this.table.codons(residue, strand);
  }

  matcher(residue: string, strand: ReadingStrand = 1): CodonMatcher {
    return this.scanner.matcher(residue, strand);
  }

  getORF(sequence: string, config?: SearchConfig): Region | undefined {
    return this.scanner.getORF(sequence, config);
  }

  getCDS(sequence: string, config?: CdsConfig): Region | undefined {
    return this.scanner.getCDS(sequence, config);
  }

  nonstop(sequence: string, config?: NonstopConfig): FrameLabel[] {
    return this.scanner.nonstop(sequence, config);
  }

  find(sequence: string, residue: string, config?: FindOptions): number[] {
    return this.scanner.find(sequence, residue, config);
  }
}
