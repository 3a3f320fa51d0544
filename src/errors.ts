/**
 * Error handling for sequence translation
 *
 * Every error the library throws derives from {@link SeqTranslateError} and
 * carries a machine-readable `code`. Errors are local to the call that
 * raised them: translation and frame scanning are pure, so there is nothing
 * to roll back or retry.
 */

/**
 * Base error class for all seqtranslate errors
 */
export class SeqTranslateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SeqTranslateError";
  }

  /**
   * Render the error with its code and context
   */
  override toString(): string {
    let msg = `${this.name} [${this.code}]: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Malformed options, residues or sequences
 */
export class ValidationError extends SeqTranslateError {
  constructor(message: string, context?: string, code: string = "VALIDATION_ERROR") {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Reasons a genetic code cannot be used
 */
export type GeneticCodeErrorCode = "UNKNOWN_TABLE_ID" | "INVALID_TABLE";

/**
 * Unknown table ids and malformed custom tables
 */
export class GeneticCodeError extends SeqTranslateError {
  constructor(
    message: string,
    code: GeneticCodeErrorCode,
    public readonly tableId?: number,
    context?: string
  ) {
    super(message, code, context);
    this.name = "GeneticCodeError";
  }

  /**
   * Error for a table id that is not registered
   */
  static unknownId(tableId: number, knownIds: readonly number[]): GeneticCodeError {
    return new GeneticCodeError(
      `Unknown genetic code: ${tableId}`,
      "UNKNOWN_TABLE_ID",
      tableId,
      `Valid codes: ${knownIds.join(", ")}`
    );
  }
}

/**
 * Reasons a pair of bounds is rejected
 */
export type CoordinateErrorCode = "INVALID_COORDINATES" | "OUT_OF_RANGE";

/**
 * Bounds that are negative, inverted, fractional or past the sequence end
 */
export class CoordinateError extends ValidationError {
  constructor(
    message: string,
    code: CoordinateErrorCode,
    public readonly lower?: number,
    public readonly upper?: number,
    context?: string
  ) {
    super(message, context, code);
    this.name = "CoordinateError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.lower !== undefined && this.upper !== undefined) {
      msg += `\nBounds: [${this.lower}, ${this.upper})`;
    }
    return msg;
  }
}

/**
 * Strand values outside the accepted set
 */
export class StrandError extends ValidationError {
  constructor(
    public readonly strand: unknown,
    accepted: readonly number[]
  ) {
    super(
      `Invalid strand: ${String(strand)}`,
      `Valid strands: ${accepted.join(", ")}`,
      "INVALID_STRAND"
    );
    this.name = "StrandError";
  }
}

/**
 * Table text or files that cannot be parsed
 */
export class ParseError extends SeqTranslateError {
  constructor(
    message: string,
    public readonly format: string,
    context?: string
  ) {
    super(message, "PARSE_ERROR", context);
    this.name = "ParseError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends SeqTranslateError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeSystemError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("not found") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("directory")) {
      return "Path points to a directory, not a file";
    }
    return undefined;
  }

  override toString(): string {
    return `${super.toString()}\nFile: ${this.filePath}\nOperation: ${this.operation}`;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_NUCLEOTIDE: "Use IUPAC nucleotide codes: A, C, G, T, U, R, Y, S, W, K, M, B, D, H, V, N",
  INVALID_RESIDUE: 'Use a one-letter amino acid code, "*", "start", "lower" or "upper"',
  INVALID_REGION: "Regions are half-open [lower, upper) with 0 <= lower <= upper <= length",
  INVALID_TABLE: "Custom tables need all 64 ACGT codons, one residue each, and concrete start codons",
} as const;

function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) {
    return systemError.message;
  }
  if (typeof systemError === "object" && systemError !== null && "message" in systemError) {
    return String(systemError.message);
  }
  return String(systemError);
}
