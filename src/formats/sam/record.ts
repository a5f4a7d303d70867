/**
 * SAM alignment records
 *
 * A SamRecord holds the eleven mandatory SAM columns plus the optional
 * fields, and derives alignment geometry from them on demand: flag
 * predicates, reference coordinates, pair orientation, template length and
 * the genomic interval the alignment covers.
 *
 * **Coordinates:**
 * - `pos` and `pnext` are 1-based, as written in the file
 * - `begin()`, `end()` and `mateBegin()` are 0-based, `end()` exclusive
 */

import { type } from "arktype";
import { SamError } from "../../errors";
import { Interval } from "../../operations/core/interval";
import {
  GAP_CONTINUATION_QUALITY,
  GAP_OPEN_QUALITY,
  qualToErrorProb,
  toNumbers,
  uniformQuality,
} from "../../operations/core/quality";
import { Cigar } from "../cigar";
import {
  bitmaskField,
  I32Field,
  TailField,
  TextField,
  U16Field,
  U32Field,
} from "../record/fields";
import { LineCodec } from "../record/line-codec";
import { comparePositions, type HeaderableRecord } from "../record/record";
import { type DecodedFlag, decodeFlag, hasFlag, SamFlag } from "./flags";
import { computeOrientation, computeTlen, type Orientation } from "./geometry";
import type { SamHeader } from "./header";
import { parseTag, type SamTag } from "./tags";

/** Placeholder for an unavailable string column */
const UNAVAILABLE = "*";

const CigarField = type("string").pipe((text: string) => Cigar.parse(text));

/**
 * Column layout of a SAM alignment line
 */
const SamColumnsSchema = type({
  qname: TextField,
  flag: bitmaskField(16),
  rname: TextField,
  pos: U32Field,
  mapq: U16Field,
  cigar: CigarField,
  rnext: TextField,
  pnext: U32Field,
  tlen: I32Field,
  seq: TextField,
  qual: TextField,
  optionals: TailField,
});

export type SamColumns = typeof SamColumnsSchema.infer;

const SAM_CODEC = new LineCodec<SamColumns>({
  format: "SAM",
  columns: [
    "qname",
    "flag",
    "rname",
    "pos",
    "mapq",
    "cigar",
    "rnext",
    "pnext",
    "tlen",
    "seq",
    "qual",
  ],
  tail: "optionals",
  validate: (raw) => SamColumnsSchema(raw),
  formatters: {
    cigar: (cigar) => (cigar.isEmpty() ? UNAVAILABLE : cigar.toString()),
  },
  createError: (message, fields, lineNumber, line) =>
    new SamError(message, fields[0], undefined, lineNumber, line),
});

/**
 * One alignment line
 *
 * Ordering and equality compare only `(rname, pos)`: two different
 * alignments at the same position are equal under `equals`.
 *
 * @example
 * ```typescript
 * const record = SamRecord.parse(
 *   "r001\t99\tchr1\t7\t30\t8M2I4M1D3M\t=\t37\t39\tTTAGATAAAGGATACTG\t*"
 * );
 * record.begin();        // 6
 * record.end();          // 22
 * record.readPaired();   // true
 * record.toInterval();   // +chr1:6-22
 * ```
 */
export class SamRecord implements SamColumns, HeaderableRecord<SamHeader> {
  qname = "";
  flag = 0;
  rname = "";
  pos = 0;
  mapq = 0;
  cigar = new Cigar();
  rnext = "";
  pnext = 0;
  tlen = 0;
  seq = "";
  qual = "";
  optionals: string[] = [];

  /** Header of the document this record was read from; not owned */
  header?: SamHeader | undefined;

  constructor(header?: SamHeader) {
    this.header = header;
  }

  /**
   * Parse one alignment line into a new record
   *
   * @throws {FormatError} When the line has fewer than 11 columns
   * @throws {SamError} When a numeric column does not parse
   * @throws {CigarError} When the CIGAR column is malformed
   */
  static parse(line: string, header?: SamHeader, lineNumber?: number): SamRecord {
    return new SamRecord(header).read(line, lineNumber);
  }

  /**
   * Position-only comparator on `(rname, pos)`
   */
  static compare(a: SamRecord, b: SamRecord): number {
    return comparePositions(a.rname, a.pos, b.rname, b.pos);
  }

  /**
   * Replace this record's columns with those of `line`
   *
   * The record is left unchanged when the line does not parse.
   */
  read(line: string, lineNumber?: number): this {
    const columns = SAM_CODEC.decode(line, lineNumber);
    Object.assign(this, columns);
    return this;
  }

  // ============================================================================
  // FLAG PREDICATES
  // ============================================================================

  readPaired(): boolean {
    return hasFlag(this.flag, SamFlag.READ_PAIRED);
  }

  properPair(): boolean {
    return hasFlag(this.flag, SamFlag.PROPER_PAIR);
  }

  readUnmapped(): boolean {
    return hasFlag(this.flag, SamFlag.READ_UNMAPPED);
  }

  mateUnmapped(): boolean {
    return hasFlag(this.flag, SamFlag.MATE_UNMAPPED);
  }

  readReverseStrand(): boolean {
    return hasFlag(this.flag, SamFlag.READ_REVERSE_STRAND);
  }

  mateReverseStrand(): boolean {
    return hasFlag(this.flag, SamFlag.MATE_REVERSE_STRAND);
  }

  firstOfPair(): boolean {
    return hasFlag(this.flag, SamFlag.FIRST_OF_PAIR);
  }

  secondOfPair(): boolean {
    return hasFlag(this.flag, SamFlag.SECOND_OF_PAIR);
  }

  secondaryAlignment(): boolean {
    return hasFlag(this.flag, SamFlag.SECONDARY_ALIGNMENT);
  }

  readFailsQualityCheck(): boolean {
    return hasFlag(this.flag, SamFlag.READ_FAILS_QUALITY_CHECK);
  }

  duplicateRead(): boolean {
    return hasFlag(this.flag, SamFlag.DUPLICATE_READ);
  }

  supplementaryAlignment(): boolean {
    return hasFlag(this.flag, SamFlag.SUPPLEMENTARY_ALIGNMENT);
  }

  decodedFlag(): DecodedFlag {
    return decodeFlag(this.flag);
  }

  // ============================================================================
  // GEOMETRY
  // ============================================================================

  /** 0-based leftmost reference position */
  begin(): number {
    return this.pos - 1;
  }

  /** 0-based exclusive end on the reference */
  end(): number {
    return this.begin() + this.cigar.refSize();
  }

  /** 0-based leftmost position of the mate, from PNEXT (not TLEN) */
  mateBegin(): number {
    return this.pnext - 1;
  }

  /**
   * Strand orientation of this read relative to its mate, from the flags
   */
  orientation(): Orientation {
    return computeOrientation(!this.readReverseStrand(), !this.mateReverseStrand());
  }

  /**
   * Template length computed against the mate's record
   */
  templateLengthWith(mate: SamRecord): number {
    return computeTlen(
      { pos: this.pos, cigar: this.cigar, forward: !this.readReverseStrand() },
      { pos: mate.pos, cigar: mate.cigar, forward: !mate.readReverseStrand() }
    );
  }

  /**
   * Whether the stored TLEN describes a usable fragment
   *
   * Requires a non-zero TLEN, a paired read with both ends mapped on
   * opposite strands, and mate coordinates consistent with TLEN.
   */
  tlenWellDefined(): boolean {
    if (this.tlen === 0) return false;
    if (!this.readPaired()) return false;
    if (this.readUnmapped() || this.mateUnmapped()) return false;
    if (this.readReverseStrand() === this.mateReverseStrand()) return false;
    if (this.readReverseStrand()) {
      return this.end() > this.mateBegin() + 1;
    }
    return this.begin() <= this.mateBegin() + this.tlen;
  }

  toInterval(): Interval {
    return new Interval(
      this.rname,
      this.begin(),
      this.end(),
      this.readReverseStrand() ? "-" : "+"
    );
  }

  // ============================================================================
  // SEQUENCE AND QUALITIES
  // ============================================================================

  /** Number of bases in SEQ; `*` counts as none */
  size(): number {
    return this.seq === UNAVAILABLE ? 0 : this.seq.length;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  /** Gap-open penalty per base for insertions, as Phred+33 text */
  insertionGop(): string {
    return uniformQuality(GAP_OPEN_QUALITY, this.size());
  }

  /** Gap-open penalty per base for deletions, as Phred+33 text */
  deletionGop(): string {
    return uniformQuality(GAP_OPEN_QUALITY, this.size());
  }

  /** Gap-continuation penalty per base, as Phred+33 text */
  overallGcp(): string {
    return uniformQuality(GAP_CONTINUATION_QUALITY, this.size());
  }

  /**
   * Per-base error probabilities from QUAL; empty when QUAL is `*`
   */
  errorProbabilities(): number[] {
    if (this.qual === UNAVAILABLE) {
      return [];
    }
    return toNumbers(this.qual).map(qualToErrorProb);
  }

  // ============================================================================
  // OPTIONAL FIELDS
  // ============================================================================

  /**
   * Decode every optional field
   *
   * @throws {SamError} On a malformed optional field
   */
  tags(): SamTag[] {
    return this.optionals.map(parseTag);
  }

  /**
   * Decode the optional field named `name`, if present
   */
  tag(name: string): SamTag | undefined {
    const prefix = `${name}:`;
    const field = this.optionals.find((optional) => optional.startsWith(prefix));
    return field === undefined ? undefined : parseTag(field);
  }

  // ============================================================================
  // ORDERING AND TEXT
  // ============================================================================

  compareTo(other: SamRecord): number {
    return SamRecord.compare(this, other);
  }

  /**
   * Position equality on `(rname, pos)`; other columns are not compared
   */
  equals(other: SamRecord): boolean {
    return SamRecord.compare(this, other) === 0;
  }

  toString(): string {
    return SAM_CODEC.encode(this);
  }
}
