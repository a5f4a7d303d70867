/**
 * VCF variant records
 *
 * INFO, FORMAT and per-sample columns are kept as opaque text.
 */

import { type } from "arktype";
import { VcfError } from "../../errors";
import { Interval } from "../../operations/core/interval";
import {
  formatOptionalFloat,
  OptionalFloatField,
  TailField,
  TextField,
  U32Field,
} from "../record/fields";
import { LineCodec } from "../record/line-codec";
import { comparePositions, type HeaderableRecord } from "../record/record";
import type { VcfHeader } from "./header";

/**
 * Column layout of a VCF data line
 */
const VcfColumnsSchema = type({
  chrom: TextField,
  pos: U32Field,
  id: TextField,
  ref: TextField,
  alt: TextField,
  qual: OptionalFloatField,
  filter: TextField,
  info: TextField,
  format: TextField,
  samples: TailField,
});

export type VcfColumns = typeof VcfColumnsSchema.infer;

const VCF_CODEC = new LineCodec<VcfColumns>({
  format: "VCF",
  columns: ["chrom", "pos", "id", "ref", "alt", "qual", "filter", "info", "format"],
  tail: "samples",
  validate: (raw) => VcfColumnsSchema(raw),
  formatters: {
    qual: formatOptionalFloat,
  },
  createError: (message, fields, lineNumber, line) =>
    new VcfError(message, fields[0], undefined, lineNumber, line),
});

/**
 * One variant line
 *
 * Ordering and equality compare only `(chrom, pos)`.
 *
 * @example
 * ```typescript
 * const record = VcfRecord.parse("7\t5000\tvar1\tC\tT\t42.5\tPASS\tDP=12\tGT\t0/1");
 * record.qual;         // 42.5
 * record.toInterval(); // +7:4999-5000
 * ```
 */
export class VcfRecord implements VcfColumns, HeaderableRecord<VcfHeader> {
  chrom = "";
  pos = 0;
  id = "";
  ref = "";
  alt = "";
  /** Undefined when the column is `.` */
  qual: number | undefined = undefined;
  filter = "";
  info = "";
  format = "";
  samples: string[] = [];

  /** Header of the document this record was read from; not owned */
  header?: VcfHeader | undefined;

  constructor(header?: VcfHeader) {
    this.header = header;
  }

  /**
   * Parse one data line into a new record
   *
   * @throws {FormatError} When the line has fewer than 9 columns
   * @throws {VcfError} When POS or QUAL does not parse
   */
  static parse(line: string, header?: VcfHeader, lineNumber?: number): VcfRecord {
    return new VcfRecord(header).read(line, lineNumber);
  }

  /**
   * Position-only comparator on `(chrom, pos)`
   */
  static compare(a: VcfRecord, b: VcfRecord): number {
    return comparePositions(a.chrom, a.pos, b.chrom, b.pos);
  }

  /**
   * Replace this record's columns with those of `line`
   *
   * The record is left unchanged when the line does not parse.
   */
  read(line: string, lineNumber?: number): this {
    const columns = VCF_CODEC.decode(line, lineNumber);
    Object.assign(this, columns);
    return this;
  }

  /**
   * The single reference base at POS, whatever the allele lengths
   */
  toInterval(): Interval {
    return new Interval(this.chrom, this.pos - 1, this.pos, "+");
  }

  compareTo(other: VcfRecord): number {
    return VcfRecord.compare(this, other);
  }

  /**
   * Position equality on `(chrom, pos)`; other columns are not compared
   */
  equals(other: VcfRecord): boolean {
    return VcfRecord.compare(this, other) === 0;
  }

  toString(): string {
    return VCF_CODEC.encode(this);
  }
}
