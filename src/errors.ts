/**
 * Error handling for genomic record parsing
 *
 * Provides clear, actionable error messages for malformed SAM/VCF lines,
 * CIGAR strings, interval text and the interval arithmetic built on them.
 */

/**
 * Base error class for all biorecord errors
 */
export class BiorecordError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "BiorecordError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for broken preconditions and invalid options
 */
export class ValidationError extends BiorecordError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends BiorecordError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A delimited line with the wrong number of columns
 */
export class FormatError extends ParseError {
  constructor(
    message: string,
    format: string,
    public readonly expectedFields: number,
    public readonly actualFields: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, format, lineNumber, context);
    this.name = "FormatError";
  }

  /**
   * Create error for a field count that does not match the record layout
   */
  static forFieldCount(
    format: string,
    expected: number,
    actual: number,
    variadic: boolean,
    lineNumber?: number,
    line?: string
  ): FormatError {
    const expectation = variadic ? `at least ${expected}` : `${expected}`;
    return new FormatError(
      `${format} line has ${actual} fields, expected ${expectation}`,
      format,
      expected,
      actual,
      lineNumber,
      line
    );
  }
}

/**
 * Malformed CIGAR strings
 */
export class CigarError extends ParseError {
  constructor(
    message: string,
    public readonly cigar: string,
    public readonly offset?: number,
    lineNumber?: number
  ) {
    super(message, "CIGAR", lineNumber, `CIGAR: ${cigar}`);
    this.name = "CigarError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.offset !== undefined) {
      msg += `\n  ${this.cigar}\n  ${" ".repeat(this.offset)}^`;
    }
    return msg;
  }
}

/**
 * SAM format-specific errors
 */
export class SamError extends ParseError {
  constructor(
    message: string,
    public readonly qname?: string,
    public readonly fieldName?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "SAM", lineNumber, context);
    this.name = "SamError";
  }
}

/**
 * VCF format-specific errors
 */
export class VcfError extends ParseError {
  constructor(
    message: string,
    public readonly chrom?: string,
    public readonly fieldName?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "VCF", lineNumber, context);
    this.name = "VcfError";
  }
}

/**
 * Arithmetic on values outside their domain: inverted intervals,
 * spans across chromosomes or strands, bad strand symbols
 */
export class DomainError extends BiorecordError {
  constructor(
    message: string,
    public readonly operation: string,
    context?: string
  ) {
    super(message, "DOMAIN_ERROR", undefined, context);
    this.name = "DomainError";
  }

  /**
   * Create error for an interval whose end lies before its begin
   */
  static forInvertedRange(chrom: string, begin: number, end: number): DomainError {
    return new DomainError(
      `Interval end must not be less than begin: ${chrom}:${begin}-${end}`,
      "construct",
      `begin: ${begin}, end: ${end}`
    );
  }

  /**
   * Create error for operations across different chromosomes or strands
   */
  static forMismatch(
    operation: string,
    what: "chrom" | "strand",
    left: string,
    right: string
  ): DomainError {
    const plural = what === "chrom" ? "chroms" : "strands";
    return new DomainError(
      `Interval.${operation}(): cannot combine intervals on different ${plural}`,
      operation,
      `${left} vs ${right}`
    );
  }
}

/**
 * File I/O errors with the failing operation and path
 */
export class FileError extends BiorecordError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
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
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
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

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends BiorecordError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  FIELD_COUNT: "Check that columns are separated by single tabs and none are missing",
  INVALID_NUMBER: "Numeric columns must hold plain integers or decimals without spaces",
  INVALID_CIGAR: "CIGAR strings are runs of <length><op> with op one of MIDNSHP=X, or '*'",
  INVALID_INTERVAL: "Intervals are written as [+|-]chrom[:begin-end], e.g. chr1:1,000-2,000",
  INTERVAL_DOMAIN: "Intervals can only be combined when chromosome and strand agree",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: BiorecordError): string {
  if (error instanceof FormatError) {
    return ERROR_SUGGESTIONS.FIELD_COUNT;
  }
  if (error instanceof CigarError) {
    return ERROR_SUGGESTIONS.INVALID_CIGAR;
  }
  if (error instanceof DomainError) {
    return ERROR_SUGGESTIONS.INTERVAL_DOMAIN;
  }
  if (error instanceof ParseError && error.format === "Interval") {
    return ERROR_SUGGESTIONS.INVALID_INTERVAL;
  }

  const message = error.message.toLowerCase();
  if (message.includes("integer") || message.includes("number")) {
    return ERROR_SUGGESTIONS.INVALID_NUMBER;
  }

  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
