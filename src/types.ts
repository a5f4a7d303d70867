/**
 * Core type definitions shared across record formats
 *
 * Runtime validation lives next to the static types as ArkType schemas,
 * so option objects and paths are checked with the same definitions the
 * compiler sees.
 */

import { type } from "arktype";

/**
 * Strand orientation of a genomic interval
 */
export type Strand = "+" | "-";

export const StrandSchema = type('"+"|"-"');

/**
 * Largest coordinate representable by an interval (unsigned 32-bit)
 */
export const MAX_POSITION = 0xffff_ffff;

/**
 * Base parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to attach original line numbers to errors */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

export const ParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "signal?": "unknown",
  "onError?": "unknown",
  "onWarning?": "unknown",
});

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options with sensible defaults
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "latin1";
  /** Maximum file size to prevent memory exhaustion (default: 1GB) */
  readonly maxFileSize?: number;
  /** AbortController signal for cancelling reads */
  readonly signal?: AbortSignal;
}

export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>0",
  "encoding?": '"utf8" | "latin1"',
  "maxFileSize?": "number>0",
  "signal?": "unknown",
});

/**
 * File metadata returned by the file reader
 */
export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  /** Complete lines, without terminators */
  readonly lines: string[];
  /** Trailing text not yet terminated by a newline */
  readonly remainder: string;
}

/**
 * File path validation: non-empty, no NUL bytes, no shell wildcards
 */
export const FilePathSchema = type("string>0").pipe((path: string, ctx) => {
  if (path.includes("\0")) {
    return ctx.error("a path without null characters");
  }
  if (/[<>"|*?]/.test(path)) {
    return ctx.error("a path without wildcard or redirection characters");
  }
  return path as FilePath;
});
