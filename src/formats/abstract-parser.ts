/**
 * Abstract base parser with shared option handling and interrupts
 *
 * Provides consistent AbortSignal support and layered option defaults across
 * the record format parsers without imposing parsing implementation details.
 *
 * @since v0.1.0
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";
import { ParserOptionsSchema } from "../types";

/**
 * Options after defaults are applied: handlers and limits are always present
 */
export type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions &
  Required<
    Pick<ParserOptions, "maxLineLength" | "trackLineNumbers" | "onError" | "onWarning">
  >;

/**
 * Abstract parser base class
 *
 * Options merge in three layers: base defaults, the format's defaults from
 * `getDefaultOptions()`, then the caller's options.
 *
 * @template T - The value type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const validation = ParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid parser options: ${validation.summary}`);
    }

    const baseDefaults = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Check if parsing should stop; call this in parsing loops
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse values from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse values from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse values from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "SAM", "VCF")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal checks shared by all parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
