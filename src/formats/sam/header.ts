/**
 * SAM header block
 */

import { SamError } from "../../errors";
import { Header } from "../record/header";

export type SamHeaderType = "HD" | "SQ" | "RG" | "PG" | "CO";

const HEADER_TYPES: readonly string[] = ["HD", "SQ", "RG", "PG", "CO"];

function isHeaderType(value: string): value is SamHeaderType {
  return HEADER_TYPES.includes(value);
}

/**
 * One decoded header line
 *
 * `@CO` lines keep their text under the `comment` field.
 */
export interface SamHeaderEntry {
  readonly type: SamHeaderType;
  readonly fields: Readonly<Record<string, string>>;
}

export interface ReferenceSequence {
  readonly name: string;
  readonly length: number;
}

/**
 * Header lines of a SAM document (lines starting with `@`)
 *
 * @example
 * ```typescript
 * const header = SamHeader.parse("@HD\tVN:1.6\n@SQ\tSN:chr1\tLN:248956422");
 * header.referenceSequences(); // [{ name: "chr1", length: 248956422 }]
 * ```
 */
export class SamHeader extends Header {
  constructor() {
    super(["@"], "SAM");
  }

  static override parse(text: string): SamHeader {
    const header = new SamHeader();
    header.read(text);
    return header;
  }

  /**
   * Decode every header line into its record type and `KEY:VALUE` fields
   *
   * @throws {SamError} On an unknown record type or a field without a colon
   */
  entries(): SamHeaderEntry[] {
    return this.lines.map((line, i) => parseHeaderLine(line, i + 1));
  }

  /**
   * Name and length of every `@SQ` line
   */
  referenceSequences(): ReferenceSequence[] {
    const sequences: ReferenceSequence[] = [];
    for (const entry of this.entries()) {
      if (entry.type !== "SQ") continue;
      const name = entry.fields.SN;
      const length = Number(entry.fields.LN);
      if (name === undefined || !Number.isInteger(length)) {
        throw new SamError("@SQ line requires SN and an integer LN", undefined, "header");
      }
      sequences.push({ name, length });
    }
    return sequences;
  }
}

function parseHeaderLine(line: string, index: number): SamHeaderEntry {
  const parts = line.slice(1).split("\t");
  const type = parts[0] ?? "";
  if (!isHeaderType(type)) {
    throw new SamError(`Invalid header type: ${type}`, undefined, "header", index, line);
  }

  const fields: Record<string, string> = {};
  if (type === "CO") {
    fields.comment = parts.slice(1).join("\t");
    return { type, fields };
  }

  for (const field of parts.slice(1)) {
    const colonIndex = field.indexOf(":");
    if (colonIndex === -1) {
      throw new SamError(`Invalid header field format: ${field}`, undefined, "header", index, line);
    }
    fields[field.slice(0, colonIndex)] = field.slice(colonIndex + 1);
  }
  return { type, fields };
}
