/**
 * NCBI Genetic Code Tables
 *
 * Definitions for the NCBI-numbered genetic codes, plus the parsers that
 * turn NCBI table notation (`ncbieaa`/`sncbieaa` strings, `gc.prt` blocks)
 * or a plain codon map into a {@link GeneticCodeDefinition}.
 *
 * The built-in tables live in `src/data/genetic-codes.json` in NCBI string
 * form and are validated when this module loads.
 *
 * @key-biological-concepts
 * 1. **Universal vs. Non-Universal Codes**: The "universal" genetic code (Table 1) is used
 *    by most organisms, but mitochondria, plastids and some nuclear genomes use variants.
 *
 * 2. **Start Codon Context**: Start codons (ATG, TTG, CTG, etc.) only initiate translation
 *    at the beginning of a CDS. Internal occurrences translate normally.
 *
 * 3. **Stop Codon Reassignment**: In some codes (e.g., ciliate nuclear), TAA/TAG are
 *    read as amino acids.
 *
 * @references
 * - NCBI Taxonomy: https://www.ncbi.nlm.nih.gov/Taxonomy/Utils/wprintgc.cgi
 *
 * @module genetic-codes
 * @since v0.1.0
 */

import { type } from "arktype";
import geneticCodeData from "../../data/genetic-codes.json";
import { ParseError } from "../../errors";

/**
 * Genetic code identifiers matching NCBI standards
 */
export enum GeneticCode {
  STANDARD = 1,
  VERTEBRATE_MITOCHONDRIAL = 2,
  YEAST_MITOCHONDRIAL = 3,
  MOLD_MITOCHONDRIAL = 4,
  INVERTEBRATE_MITOCHONDRIAL = 5,
  CILIATE_NUCLEAR = 6,
  ECHINODERM_MITOCHONDRIAL = 9,
  EUPLOTID_NUCLEAR = 10,
  BACTERIAL_PLASTID = 11,
  ALTERNATIVE_YEAST_NUCLEAR = 12,
  ASCIDIAN_MITOCHONDRIAL = 13,
  ALTERNATIVE_FLATWORM_MITOCHONDRIAL = 14,
  CHLOROPHYCEAN_MITOCHONDRIAL = 16,
  TREMATODE_MITOCHONDRIAL = 21,
  SCENEDESMUS_MITOCHONDRIAL = 22,
  THRAUSTOCHYTRIUM_MITOCHONDRIAL = 23,
  RHABDOPLEURIDAE_MITOCHONDRIAL = 24,
  CANDIDATE_DIVISION_SR1 = 25,
  PACHYSOLEN_NUCLEAR = 26,
  KARYORELICT_NUCLEAR = 27,
  CONDYLOSTOMA_NUCLEAR = 28,
  MESODINIUM_NUCLEAR = 29,
  PERITRICH_NUCLEAR = 30,
  BLASTOCRITHIDIA_NUCLEAR = 31,
  BALANOPHORACEAE_PLASTID = 32,
  CEPHALODISCIDAE_MITOCHONDRIAL = 33,
}

/**
 * Codon to amino acid mapping for a genetic code
 */
export interface CodonTable {
  readonly [codon: string]: string;
}

/**
 * Complete genetic code definition: 64 concrete codons and their residues,
 * plus the forward-strand start codons
 */
export interface GeneticCodeDefinition {
  readonly id: number;
  readonly name: string;
  readonly shortName: string;
  readonly codons: CodonTable;
  readonly startCodons: readonly string[];
}

/**
 * A table in NCBI notation. Each string position `i` describes the codon
 * `base1[i] + base2[i] + base3[i]`; `sncbieaa` marks starts with `M`.
 */
export interface NcbiTableStrings {
  readonly id: number;
  readonly name: string;
  readonly shortName?: string;
  readonly ncbieaa: string;
  readonly sncbieaa: string;
  readonly base1?: string;
  readonly base2?: string;
  readonly base3?: string;
}

// =============================================================================
// NCBI NOTATION
// =============================================================================

const NCBI_ORDER = "TCAG";

// NCBI lists codons with the first base varying slowest, in TCAG order
const NCBI_BASE1 = Array.from({ length: 64 }, (_, i) => NCBI_ORDER[i >> 4]).join("");
const NCBI_BASE2 = Array.from({ length: 64 }, (_, i) => NCBI_ORDER[(i >> 2) & 3]).join("");
const NCBI_BASE3 = Array.from({ length: 64 }, (_, i) => NCBI_ORDER[i & 3]).join("");

export const NcbiTableSchema = type({
  id: "number.integer >= 0",
  name: "string > 0",
  "shortName?": "string",
  ncbieaa: "string == 64",
  sncbieaa: "string == 64",
  "base1?": "string == 64",
  "base2?": "string == 64",
  "base3?": "string == 64",
});

const NcbiTableArraySchema = NcbiTableSchema.array();

/**
 * Build a definition from NCBI table strings
 *
 * @throws {ParseError} When the strings are not 64 characters long
 *
 * @example
 * ```typescript
 * const def = definitionFromNcbi({
 *   id: 1,
 *   name: "Standard",
 *   ncbieaa: "FFLLSSSSYY**CC*WLLLLPPPPHHQQRRRRIIIMTTTTNNKKSSRRVVVVAAAADDEEGGGG",
 *   sncbieaa: "---M------**--*----M---------------M----------------------------",
 * });
 * def.codons.TGA;  // '*'
 * def.startCodons; // ['TTG', 'CTG', 'ATG']
 * ```
 */
export function definitionFromNcbi(strings: NcbiTableStrings): GeneticCodeDefinition {
  const validated = NcbiTableSchema(strings);
  if (validated instanceof type.errors) {
    throw new ParseError(`Invalid NCBI table: ${validated.summary}`, "NCBI");
  }

  const base1 = toDNA(validated.base1 ?? NCBI_BASE1);
  const base2 = toDNA(validated.base2 ?? NCBI_BASE2);
  const base3 = toDNA(validated.base3 ?? NCBI_BASE3);

  const codons: Record<string, string> = {};
  const startCodons: string[] = [];

  for (let i = 0; i < 64; i++) {
    const codon = `${base1[i]}${base2[i]}${base3[i]}`;
    codons[codon] = validated.ncbieaa.charAt(i).toUpperCase();
    if (validated.sncbieaa.charAt(i).toUpperCase() === "M") {
      startCodons.push(codon);
    }
  }

  return {
    id: validated.id,
    name: validated.name,
    shortName: validated.shortName ?? "",
    codons,
    startCodons,
  };
}

/**
 * Parse one table block in NCBI `gc.prt` notation
 *
 * The first `name` is the table name, a second `name` its short name.
 * `-- Base1`/`Base2`/`Base3` comment lines, when present, give the codon
 * order; otherwise the standard NCBI order is assumed. A missing `id`
 * becomes 0.
 *
 * @throws {ParseError} When `name`, `ncbieaa` or `sncbieaa` is missing
 *
 * @example
 * ```typescript
 * const def = parseNcbiTable(`{
 *   name "Standard" ,
 *   name "SGC0" ,
 *   id 1 ,
 *   ncbieaa  "FFLLSSSSYY**CC*WLLLLPPPPHHQQRRRRIIIMTTTTNNKKSSRRVVVVAAAADDEEGGGG",
 *   sncbieaa "---M------**--*----M---------------M----------------------------"
 * }`);
 * ```
 */
export function parseNcbiTable(text: string): GeneticCodeDefinition {
  const names = Array.from(text.matchAll(/\bname\s+"([^"]*)"/g), (m) =>
    (m[1] ?? "").replace(/\s+/g, " ").trim()
  );
  const id = /\bid\s+(\d+)/.exec(text)?.[1];
  const ncbieaa = /\bncbieaa\s+"([^"]*)"/.exec(text)?.[1];
  const sncbieaa = /\bsncbieaa\s+"([^"]*)"/.exec(text)?.[1];

  const [name, shortName] = names;
  if (name === undefined || ncbieaa === undefined || sncbieaa === undefined) {
    throw new ParseError(
      "NCBI table must define name, ncbieaa and sncbieaa",
      "NCBI",
      text.length > 80 ? `${text.slice(0, 80)}...` : text
    );
  }

  const bases: Record<string, string> = {};
  for (const match of text.matchAll(/--\s*Base([123])\s+([ACGTU]+)/gi)) {
    const [, which, letters] = match;
    if (which !== undefined && letters !== undefined) {
      bases[which] = letters;
    }
  }

  return definitionFromNcbi({
    id: id === undefined ? 0 : Number.parseInt(id, 10),
    name,
    ...(shortName !== undefined && { shortName }),
    ncbieaa: ncbieaa.replace(/\s+/g, ""),
    sncbieaa: sncbieaa.replace(/\s+/g, ""),
    ...(bases["1"] !== undefined && { base1: bases["1"] }),
    ...(bases["2"] !== undefined && { base2: bases["2"] }),
    ...(bases["3"] !== undefined && { base3: bases["3"] }),
  });
}

function toDNA(bases: string): string {
  return bases.toUpperCase().replace(/U/g, "T");
}

// =============================================================================
// BUILT-IN CODES
// =============================================================================

function loadBuiltInCodes(): Map<number, GeneticCodeDefinition> {
  const parsed = NcbiTableArraySchema(geneticCodeData);
  if (parsed instanceof type.errors) {
    throw new ParseError(`Invalid built-in genetic code data: ${parsed.summary}`, "JSON");
  }
  return new Map(parsed.map((entry) => [entry.id, definitionFromNcbi(entry)]));
}

const GENETIC_CODES: ReadonlyMap<number, GeneticCodeDefinition> = loadBuiltInCodes();

/**
 * Get genetic code definition by ID
 */
export function getGeneticCode(codeId: number): GeneticCodeDefinition | undefined {
  return GENETIC_CODES.get(codeId);
}

/**
 * Ids of every built-in genetic code, ascending
 */
export function geneticCodeIds(): number[] {
  return Array.from(GENETIC_CODES.keys()).sort((a, b) => a - b);
}

/**
 * List all available genetic codes
 */
export function listGeneticCodes(): Array<{
  id: number;
  name: string;
  shortName: string;
}> {
  return geneticCodeIds().flatMap((id) => {
    const code = GENETIC_CODES.get(id);
    return code === undefined ? [] : [{ id: code.id, name: code.name, shortName: code.shortName }];
  });
}

export const GeneticCodes = {
  get: getGeneticCode,
  ids: geneticCodeIds,
  list: listGeneticCodes,
  fromNcbi: definitionFromNcbi,
  parse: parseNcbiTable,
} as const;
