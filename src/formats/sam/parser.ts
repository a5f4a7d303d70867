/**
 * SAM document parser
 */

import { SamError } from "../../errors";
import type { ParserOptions } from "../../types";
import { TextRecordParser } from "../record/parser";
import { SamHeader } from "./header";
import { SamRecord } from "./record";

/**
 * Streaming SAM parser
 *
 * Yields one SamRecord per alignment line; `@` lines before the first
 * alignment form the header every record points back to.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new SAMParser();
 * for await (const record of parser.parseFile("alignments.sam")) {
 *   console.log(`${record.qname} -> ${record.toInterval()}`);
 * }
 * ```
 *
 * @example With custom options
 * ```typescript
 * const parser = new SAMParser({
 *   onError: (error, lineNumber) => console.error(`Line ${lineNumber}: ${error}`),
 * });
 * ```
 */
class SAMParser extends TextRecordParser<SamRecord, SamHeader> {
  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      maxLineLength: 10_000_000, // long reads
      onError: (error: string, lineNumber?: number): void => {
        throw new SamError(error, undefined, undefined, lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`SAM Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "SAM";
  }

  protected createHeader(): SamHeader {
    return new SamHeader();
  }

  protected parseRecord(line: string, lineNumber: number): SamRecord {
    return SamRecord.parse(line, undefined, lineNumber);
  }
}

export { SAMParser };
