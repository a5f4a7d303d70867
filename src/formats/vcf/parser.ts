/**
 * VCF document parser
 */

import { VcfError } from "../../errors";
import type { ParserOptions } from "../../types";
import { TextRecordParser } from "../record/parser";
import { VcfHeader } from "./header";
import { VcfRecord } from "./record";

/**
 * Streaming VCF parser
 *
 * @example
 * ```typescript
 * const parser = new VCFParser();
 * const { header, records } = await parser.readDocument(vcfText);
 * header.sampleNames();
 * ```
 */
class VCFParser extends TextRecordParser<VcfRecord, VcfHeader> {
  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      onError: (error: string, lineNumber?: number): void => {
        throw new VcfError(error, undefined, undefined, lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`VCF Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "VCF";
  }

  protected createHeader(): VcfHeader {
    return new VcfHeader();
  }

  protected parseRecord(line: string, lineNumber: number): VcfRecord {
    return VcfRecord.parse(line, undefined, lineNumber);
  }
}

export { VCFParser };
