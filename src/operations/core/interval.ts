/**
 * Half-open genomic intervals
 *
 * An interval names a chromosome, a strand and the zero-based range
 * `[begin, end)` on it. Every record type projects itself onto an interval,
 * so overlap, containment and spanning questions are answered here once.
 *
 * @module interval
 * @since v0.1.0
 */

import { type } from "arktype";
import { DomainError, ParseError } from "../../errors";
import { MAX_POSITION, type Strand, StrandSchema } from "../../types";

// =============================================================================
// HELPERS
// =============================================================================

const LEADING_DIGITS = /^\d+/;

function isStrand(value: string): value is Strand {
  return !(StrandSchema(value) instanceof type.errors);
}

function isPosition(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_POSITION;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Read the leading digit run of `text` as a coordinate
 */
function leadingPosition(text: string, source: string, what: string): number {
  const match = LEADING_DIGITS.exec(text);
  if (match === null) {
    throw new ParseError(`Missing ${what} coordinate in interval '${source}'`, "Interval");
  }
  const value = Number.parseInt(match[0], 10);
  if (value > MAX_POSITION) {
    throw new ParseError(
      `Interval ${what} ${match[0]} exceeds maximum position ${MAX_POSITION}`,
      "Interval"
    );
  }
  return value;
}

// =============================================================================
// INTERVAL
// =============================================================================

/**
 * Immutable half-open interval on one strand of one chromosome
 *
 * @example
 * ```typescript
 * const a = Interval.parse("chr1:1,000-2,000");
 * const b = new Interval("chr1", 1500, 2500);
 * a.overlaps(b);            // true
 * a.spanWith(b).toString(); // "+chr1:1000-2500"
 * ```
 */
export class Interval {
  readonly chrom: string;
  readonly begin: number;
  readonly end: number;
  readonly strand: Strand;

  constructor(chrom: string, begin: number, end: number, strand: string = "+") {
    if (!isStrand(strand)) {
      throw new DomainError(`Invalid strand '${strand}', expected '+' or '-'`, "construct");
    }
    if (!isPosition(begin) || !isPosition(end)) {
      throw new DomainError(
        `Interval coordinates must be integers in [0, ${MAX_POSITION}]`,
        "construct",
        `begin: ${begin}, end: ${end}`
      );
    }
    if (end < begin) {
      throw DomainError.forInvertedRange(chrom, begin, end);
    }

    this.chrom = chrom;
    this.begin = begin;
    this.end = end;
    this.strand = strand;
  }

  /**
   * Parse interval text of the form `[+|-]chrom[:begin-end|:pos[+]]`
   *
   * Commas in coordinates are ignored. Without a range the interval covers
   * the whole chromosome; a single position covers one base, or runs to
   * the end of the chromosome when followed by `+`.
   *
   * @example
   * ```typescript
   * Interval.parse("chr1");          // chr1 [0, 4294967295)
   * Interval.parse("-chr2:100-200"); // chr2 [100, 200) on '-'
   * Interval.parse("chr3:1,500");    // chr3 [1500, 1501)
   * Interval.parse("chr3:1500+");    // chr3 [1500, 4294967295)
   * ```
   */
  static parse(text: string): Interval {
    if (text.length === 0) {
      throw new ParseError("Interval text cannot be empty", "Interval");
    }

    let strand: Strand = "+";
    let body = text;
    const first = body.charAt(0);
    if (isStrand(first)) {
      strand = first;
      body = body.slice(1);
    }

    const colon = body.indexOf(":");
    const chrom = colon === -1 ? body : body.slice(0, colon);
    if (chrom.length === 0) {
      throw new ParseError(`Missing chromosome name in interval '${text}'`, "Interval");
    }
    if (colon === -1) {
      return new Interval(chrom, 0, MAX_POSITION, strand);
    }

    const range = body.slice(colon + 1).replaceAll(",", "");
    const begin = leadingPosition(range, text, "begin");
    const dash = range.indexOf("-");

    let end: number;
    if (dash !== -1) {
      end = leadingPosition(range.slice(dash + 1), text, "end");
    } else if (range.endsWith("+")) {
      end = MAX_POSITION;
    } else {
      end = begin + 1;
      if (end > MAX_POSITION) {
        throw new ParseError(
          `Interval position ${begin} leaves no room for a one-base range`,
          "Interval"
        );
      }
    }

    if (end < begin) {
      throw new ParseError(
        `Interval end ${end} is less than begin ${begin} in '${text}'`,
        "Interval"
      );
    }
    return new Interval(chrom, begin, end, strand);
  }

  /**
   * Ordering by chrom, then begin, end and strand
   */
  static compare(a: Interval, b: Interval): number {
    return (
      compareText(a.chrom, b.chrom) ||
      a.begin - b.begin ||
      a.end - b.end ||
      compareText(a.strand, b.strand)
    );
  }

  size(): number {
    return this.end - this.begin;
  }

  isEmpty(): boolean {
    return this.begin === this.end;
  }

  /**
   * True when both intervals share chrom and strand and at least one base
   */
  overlaps(other: Interval): boolean {
    return (
      this.chrom === other.chrom &&
      this.strand === other.strand &&
      this.begin < other.end &&
      other.begin < this.end
    );
  }

  /**
   * True when `other` lies entirely within this interval on the same strand
   */
  contains(other: Interval): boolean {
    return (
      this.chrom === other.chrom &&
      this.strand === other.strand &&
      this.begin <= other.begin &&
      this.end >= other.end
    );
  }

  /**
   * Smallest interval covering both
   *
   * @throws {DomainError} When chromosome or strand differ
   */
  spanWith(other: Interval): Interval {
    if (this.chrom !== other.chrom) {
      throw DomainError.forMismatch("spanWith", "chrom", this.chrom, other.chrom);
    }
    if (this.strand !== other.strand) {
      throw DomainError.forMismatch("spanWith", "strand", this.strand, other.strand);
    }
    return new Interval(
      this.chrom,
      Math.min(this.begin, other.begin),
      Math.max(this.end, other.end),
      this.strand
    );
  }

  /**
   * Widen both ends by `padding`, clamped to `[0, MAX_POSITION]`
   *
   * @throws {DomainError} When padding is negative or not an integer
   */
  expandWith(padding: number): Interval {
    if (!Number.isInteger(padding) || padding < 0) {
      throw new DomainError(
        `Padding must be a non-negative integer, got ${padding}`,
        "expandWith"
      );
    }
    return new Interval(
      this.chrom,
      Math.max(0, this.begin - padding),
      Math.min(MAX_POSITION, this.end + padding),
      this.strand
    );
  }

  equals(other: Interval): boolean {
    return Interval.compare(this, other) === 0;
  }

  compareTo(other: Interval): number {
    return Interval.compare(this, other);
  }

  toString(): string {
    return `${this.strand}${this.chrom}:${this.begin}-${this.end}`;
  }
}
