/**
 * Generic writer for header-plus-records text formats
 */

import { ValidationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import type { Header } from "./header";

/**
 * Writes a header block followed by one line per record, each line ending
 * in `\n`
 *
 * @example
 * ```typescript
 * const writer = new SAMWriter();
 * const text = writer.formatString(header, records);
 * await writer.writeFile("out.sam", header, records);
 * ```
 */
export class TextRecordWriter<R extends { toString(): string }, H extends Header> {
  constructor(readonly format: string) {}

  /**
   * Format a whole document; an empty or missing header contributes no lines
   */
  formatString(header: H | undefined, records: Iterable<R>): string {
    let output = "";
    for (const line of this.formatLines(header, records)) {
      output += `${line}\n`;
    }
    return output;
  }

  /**
   * Write a whole document to a file, replacing any existing content
   *
   * @throws {FileError} When the file cannot be written
   */
  async writeFile(filePath: string, header: H | undefined, records: Iterable<R>): Promise<void> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    await writeString(filePath, this.formatString(header, records));
  }

  /**
   * Write a document to a WritableStream, one encoded line at a time
   */
  async writeStream(
    stream: WritableStream<Uint8Array>,
    header: H | undefined,
    records: Iterable<R> | AsyncIterable<R>
  ): Promise<void> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();

    try {
      if (header !== undefined) {
        for (const line of header.lines) {
          await writer.write(encoder.encode(`${line}\n`));
        }
      }
      for await (const record of records) {
        await writer.write(encoder.encode(`${record.toString()}\n`));
      }
    } finally {
      writer.releaseLock();
    }
  }

  private *formatLines(header: H | undefined, records: Iterable<R>): Generator<string> {
    if (header !== undefined) {
      yield* header.lines;
    }
    for (const record of records) {
      yield record.toString();
    }
  }
}
