/**
 * seqtranslate - genetic-sequence translation engine
 *
 * Finds the longest ORFs and CDSs in nucleotide sequences and translates
 * them through any NCBI genetic code or a custom table, with IUPAC
 * degenerate bases handled on both strands.
 */

// Error types
export {
  CoordinateError,
  type CoordinateErrorCode,
  ERROR_SUGGESTIONS,
  FileError,
  GeneticCodeError,
  type GeneticCodeErrorCode,
  ParseError,
  SeqTranslateError,
  StrandError,
  ValidationError,
} from "./errors";
// File I/O
export {
  FileReader,
  type FileReaderOptions,
  loadTranslationTable,
  readSequenceFile,
  readToString,
} from "./io/file-reader";
// Alphabets and cleaning
export {
  AMBIGUOUS_AMINO_ACID_MAP,
  AMBIGUOUS_AMINO_ACIDS,
  AMINO_ACID_ABBREVIATIONS,
  AMINO_ACIDS,
  type CleanDNA,
  CODON_SYMBOLS,
  CONCRETE_NUCLEOTIDES,
  cleanDNA,
  DEGENERATE_MAP,
  DEGENERATE_NUCLEOTIDES,
  expandCodon,
  expandNucleotide,
  isCleanDNA,
  isDegenerate,
  isResidue,
  NUCLEOTIDES,
  prepareSequence,
  randomDNA,
  START_RESIDUE,
  STOP_RESIDUE,
  STRICT_AMINO_ACIDS,
  UNKNOWN_RESIDUE,
} from "./operations/core/alphabet";
// Translation tables
export {
  type CodonKey,
  codonAt,
  codonIndex,
  getTranslationTable,
  isStartCodon,
  isStopCodon,
  resolveResidue,
  TranslationTable,
} from "./operations/core/codon-table";
// Coordinates
export {
  assertRegionFits,
  contains,
  createRegion,
  encloses,
  extendRegion,
  extractSequence,
  extractStrandSequence,
  type FormatOptions,
  formatRegion,
  fromE53,
  intersection,
  locationFromE53,
  overlaps,
  RegionFormat,
  regionFromUpperLength,
  regionLength,
  regionPhase,
  regionsEqual,
  resolveBounds,
  strandSymbol,
  toE53,
} from "./operations/core/coordinates";
// Genetic codes
export {
  type CodonTable,
  definitionFromNcbi,
  GeneticCode,
  type GeneticCodeDefinition,
  GeneticCodes,
  geneticCodeIds,
  getGeneticCode,
  listGeneticCodes,
  NcbiTableSchema,
  type NcbiTableStrings,
  parseNcbiTable,
} from "./operations/core/genetic-codes";
// Codon matchers
export { type CodonMatcher, MatcherCache, sharedMatcherCache } from "./operations/core/pattern-matcher";
// Sequence manipulation
export { complement, reverse, reverseComplement } from "./operations/core/sequence-manipulation";
// Scanning and translation
export { FrameScanner } from "./operations/reading-frames";
export { type SixFrameTranslation, Translator } from "./operations/translate";
// Core types
export type {
  CdsConfig,
  CodonOptions,
  Ends53,
  FindOptions,
  FrameLabel,
  Location,
  NonstopConfig,
  Phase,
  RangeOptions,
  ReadingStrand,
  Region,
  SearchConfig,
  SpecialResidue,
  Strand,
  StrictLevel,
  TranslateOptions,
} from "./types";
export {
  assertStrandOption,
  CdsConfigSchema,
  CodonOptionsSchema,
  FindOptionsSchema,
  FRAME_LABELS,
  isStrand,
  NonstopConfigSchema,
  RangeOptionsSchema,
  RegionSchema,
  SearchConfigSchema,
  searchStrands,
  TranslateOptionsSchema,
} from "./types";
