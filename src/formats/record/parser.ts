/**
 * Generic document parser for header-plus-records text formats
 *
 * SAM and VCF share one document shape: a block of header lines, each
 * starting with the format's start symbol, followed by one record per line.
 * This parser owns that shape; formats only say how to build their header
 * and how to read one record line.
 */

import { ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import type { FileReaderOptions, ParserOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { Header } from "./header";
import type { HeaderableRecord, TextDocument } from "./record";

/**
 * Parser for a header block followed by record lines
 *
 * - Header lines before the first record go to the document header
 * - Header-looking lines after the first record are reported through
 *   `onWarning` and skipped
 * - Blank lines are skipped and a trailing `\r` is removed
 * - Every record references the header of its document
 *
 * @template R - Record type
 * @template H - Header type
 */
export abstract class TextRecordParser<
  R extends HeaderableRecord<H>,
  H extends Header,
  TOptions extends ParserOptions = ParserOptions,
> extends AbstractParser<R, TOptions> {
  private currentHeader: H | undefined;

  /**
   * Fresh, empty header for a new document
   */
  protected abstract createHeader(): H;

  /**
   * Read one record line
   */
  protected abstract parseRecord(line: string, lineNumber: number): R;

  /**
   * Header of the document started most recently; `readDocument` returns
   * its own header and does not depend on this
   */
  get header(): H | undefined {
    return this.currentHeader;
  }

  override async *parseString(data: string): AsyncIterable<R> {
    yield* this.parseLines(data.split("\n"), this.startDocument());
  }

  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<R> {
    yield* this.parseLines(readLines(stream), this.startDocument());
  }

  override async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<R> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    const stream = await createStream(filePath, {
      ...options,
      ...(options?.signal === undefined &&
        this.options.signal !== undefined && { signal: this.options.signal }),
    });
    yield* this.parseLines(readLines(stream, options?.encoding ?? "utf8"), this.startDocument());
  }

  /**
   * Parse a whole document held in a string
   */
  async readDocument(data: string): Promise<TextDocument<R, H>> {
    const header = this.startDocument();
    const records: R[] = [];
    for await (const record of this.parseLines(data.split("\n"), header)) {
      records.push(record);
    }
    return { header, records };
  }

  private startDocument(): H {
    const header = this.createHeader();
    this.currentHeader = header;
    return header;
  }

  private async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>,
    header: H
  ): AsyncIterable<R> {
    let inHeader = true;
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      this.throwIfAborted(`parsing at line ${lineNumber}`);

      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
      if (line.length === 0) {
        continue;
      }

      if (line.length > this.options.maxLineLength) {
        this.options.onError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          this.options.trackLineNumbers ? lineNumber : undefined
        );
        continue;
      }

      if (header.accepts(line)) {
        if (inHeader) {
          header.append(line, lineNumber);
        } else {
          this.options.onWarning(
            "Header line after the first record is ignored",
            this.options.trackLineNumbers ? lineNumber : undefined
          );
        }
        continue;
      }
      inHeader = false;

      let record: R;
      try {
        record = this.parseRecord(line, lineNumber);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        this.options.onError(errorMsg, this.options.trackLineNumbers ? lineNumber : undefined);
        continue;
      }
      record.header = header;
      yield record;
    }
  }
}
