/**
 * File input for sequences and genetic code tables
 *
 * Reads run as Effect programs over the platform `FileSystem`, provided
 * with the Node.js context layer, and resolve to plain promises. Each read
 * is debug-logged through Effect's logger; raise the minimum log level to
 * see it.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError, ParseError, SeqTranslateError } from "../errors";
import { type CleanDNA, cleanDNA } from "../operations/core/alphabet";
import { TranslationTable } from "../operations/core/codon-table";
import {
  type GeneticCodeDefinition,
  NcbiTableSchema,
  definitionFromNcbi,
  parseNcbiTable,
} from "../operations/core/genetic-codes";

/**
 * Options for reading a file
 */
export interface FileReaderOptions {
  /** Largest file accepted, in bytes (default: 100MB) */
  maxFileSize?: number;
}

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 104_857_600,
};

const FilePathSchema = type("string > 0");

const FileReaderOptionsSchema = type({
  "maxFileSize?": "number.integer > 0",
});

/**
 * Custom table as JSON: a codon map with start codons
 */
const DefinitionFileSchema = type({
  "id?": "number.integer >= 0",
  name: "string",
  "shortName?": "string",
  codons: { "[string]": "string" },
  "startCodons?": "string[]",
});

// =============================================================================
// EFFECT PROGRAMS
// =============================================================================

function readFileString(
  path: string,
  maxFileSize: number
): Effect.Effect<string, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const info = yield* fs
      .stat(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError(`Not a regular file: ${path}`, path, "stat", undefined, `Type: ${info.type}`)
      );
    }

    const size = Number(info.size);
    if (size > maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${size} bytes exceeds limit of ${maxFileSize} bytes`,
          path,
          "read"
        )
      );
    }

    const content = yield* fs
      .readFileString(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));

    yield* Effect.logDebug("read file").pipe(Effect.annotateLogs({ path, bytes: size }));
    return content;
  });
}

function parseTableFile(
  path: string,
  content: string
): Effect.Effect<TranslationTable, SeqTranslateError> {
  return Effect.try({
    try: () => {
      const definition = path.toLowerCase().endsWith(".json")
        ? definitionFromJson(content)
        : parseNcbiTable(content);
      return TranslationTable.fromDefinition(definition);
    },
    catch: (error) =>
      error instanceof SeqTranslateError
        ? error
        : new ParseError(`Cannot parse table file: ${String(error)}`, "TABLE", path),
  });
}

function definitionFromJson(content: string): GeneticCodeDefinition {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ParseError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      "JSON"
    );
  }

  if (typeof parsed === "object" && parsed !== null && "ncbieaa" in parsed) {
    const ncbi = NcbiTableSchema(parsed);
    if (ncbi instanceof type.errors) {
      throw new ParseError(`Invalid NCBI table: ${ncbi.summary}`, "JSON");
    }
    return definitionFromNcbi(ncbi);
  }

  const table = DefinitionFileSchema(parsed);
  if (table instanceof type.errors) {
    throw new ParseError(`Invalid table definition: ${table.summary}`, "JSON");
  }
  return {
    id: table.id ?? 0,
    name: table.name,
    shortName: table.shortName ?? "",
    codons: table.codons,
    startCodons: table.startCodons ?? [],
  };
}

/**
 * Run a program against the Node.js platform, rejecting with its typed error
 */
async function run<A>(
  program: Effect.Effect<A, SeqTranslateError, FileSystem.FileSystem>
): Promise<A> {
  const result = await Effect.runPromise(
    program.pipe(Effect.either, Effect.provide(NodeContext.layer))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Read an entire file as UTF-8 text
 *
 * @throws {FileError} If the path is invalid, missing, not a file or too large
 *
 * @example
 * ```typescript
 * const text = await readToString("table.prt");
 * ```
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const { validatedPath, maxFileSize } = validateRequest(path, options);
  return run(readFileString(validatedPath, maxFileSize));
}

/**
 * Read a FASTA or plain sequence file into a clean sequence. Header lines
 * are dropped, so a multi-record file yields its records concatenated.
 *
 * @example
 * ```typescript
 * const seq = await readSequenceFile("gene.fa");
 * translator.getORF(seq, { sanitized: true });
 * ```
 */
export async function readSequenceFile(
  path: string,
  options: FileReaderOptions = {}
): Promise<CleanDNA> {
  const { validatedPath, maxFileSize } = validateRequest(path, options);

  const program = Effect.gen(function* () {
    const raw = yield* readFileString(validatedPath, maxFileSize);
    const sequence = yield* Effect.try({
      try: () => cleanDNA(raw),
      catch: (error) =>
        error instanceof SeqTranslateError
          ? error
          : new ParseError(`Cannot read sequence: ${String(error)}`, "FASTA", validatedPath),
    });
    yield* Effect.logDebug("cleaned sequence").pipe(
      Effect.annotateLogs({ path: validatedPath, symbols: raw.length, kept: sequence.length })
    );
    return sequence;
  });

  return run(program);
}

/**
 * Load a custom translation table.
 *
 * `.json` files hold either a codon map (`{ name, codons, startCodons }`)
 * or NCBI strings (`{ id, name, ncbieaa, sncbieaa }`); anything else is
 * read as an NCBI `gc.prt` table block.
 *
 * @throws {FileError} If the file cannot be read
 * @throws {ParseError} If the contents are not a table
 * @throws {GeneticCodeError} If the table is incomplete
 */
export async function loadTranslationTable(
  path: string,
  options: FileReaderOptions = {}
): Promise<TranslationTable> {
  const { validatedPath, maxFileSize } = validateRequest(path, options);

  const program = Effect.gen(function* () {
    const content = yield* readFileString(validatedPath, maxFileSize);
    const table = yield* parseTableFile(validatedPath, content);
    yield* Effect.logDebug("loaded translation table").pipe(
      Effect.annotateLogs({ path: validatedPath, id: table.id, name: table.name })
    );
    return table;
  });

  return run(program);
}

export const FileReader = {
  readToString,
  readSequenceFile,
  loadTranslationTable,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function validateRequest(
  path: string,
  options: FileReaderOptions
): { validatedPath: string; maxFileSize: number } {
  const validatedPath = FilePathSchema(path);
  if (validatedPath instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validatedPath.summary}`, path, "stat");
  }
  const validatedOptions = FileReaderOptionsSchema(options);
  if (validatedOptions instanceof type.errors) {
    throw new FileError(`Invalid reader options: ${validatedOptions.summary}`, path, "read");
  }
  return {
    validatedPath,
    maxFileSize: validatedOptions.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
  };
}
