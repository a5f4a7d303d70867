/**
 * CIGAR alignment operation lists
 *
 * A CIGAR is the run-length encoded description of how a read aligns to the
 * reference: `10M2I5M` reads as ten aligned bases, two inserted bases, five
 * aligned bases. This module provides:
 * - Parsing of CIGAR text with offset-precise errors
 * - Reference-consumed, read-consumed and clipped lengths
 * - In-place building and editing, including canonicalization by `compact()`
 *
 * `*` (CIGAR unavailable) parses to the empty Cigar.
 */

import { CigarError, ValidationError } from "../errors";

/**
 * CIGAR operation characters
 */
export const CigarOp = {
  MATCH: "M",
  INSERTION: "I",
  DELETION: "D",
  SKIP: "N",
  SOFT_CLIP: "S",
  HARD_CLIP: "H",
  PADDING: "P",
  SEQUENCE_MATCH: "=",
  SEQUENCE_MISMATCH: "X",
} as const;

export type CigarOp = (typeof CigarOp)[keyof typeof CigarOp];

const CIGAR_OPS: ReadonlySet<string> = new Set(Object.values(CigarOp));

// Operations consuming reference bases, read bases, or clipping the read
const REFERENCE_OPS: ReadonlySet<CigarOp> = new Set<CigarOp>(["M", "D", "N", "=", "X"]);
const READ_OPS: ReadonlySet<CigarOp> = new Set<CigarOp>(["M", "I", "S", "=", "X"]);
const CLIP_OPS: ReadonlySet<CigarOp> = new Set<CigarOp>(["S", "H"]);

const MAX_OPERATION_LENGTH = 0xffff_ffff;

function isCigarOp(char: string): char is CigarOp {
  return CIGAR_OPS.has(char);
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

/**
 * One `<length><op>` run
 */
class CigarElement {
  constructor(
    readonly size: number,
    readonly op: CigarOp
  ) {
    if (!Number.isInteger(size) || size < 0 || size > MAX_OPERATION_LENGTH) {
      throw new ValidationError(`CIGAR operation length must be an unsigned integer, got ${size}`);
    }
  }

  equals(other: CigarElement): boolean {
    return this.size === other.size && this.op === other.op;
  }

  toString(): string {
    return `${this.size}${this.op}`;
  }
}

/**
 * Ordered list of CIGAR elements in alignment order
 *
 * Not canonical unless `compact()` has been called: `2M3M` and `5M` describe
 * the same alignment but are different Cigars.
 *
 * @example
 * ```typescript
 * const cigar = Cigar.parse("5S10M2I3M");
 * cigar.refSize();  // 13
 * cigar.readSize(); // 20
 * cigar.clipSize(); // 5
 * ```
 */
class Cigar implements Iterable<CigarElement> {
  private elements: CigarElement[];

  constructor(elements: Iterable<CigarElement> = []) {
    this.elements = [...elements];
  }

  /**
   * Parse CIGAR text; `""` and `"*"` give the empty Cigar
   *
   * @throws {CigarError} On a missing length, an unknown operation or
   * trailing digits without an operation
   */
  static parse(text: string, lineNumber?: number): Cigar {
    const cigar = new Cigar();
    if (text === "*") {
      return cigar;
    }

    let offset = 0;
    while (offset < text.length) {
      const start = offset;
      while (offset < text.length && isDigit(text.charAt(offset))) {
        offset++;
      }
      if (offset === start) {
        throw new CigarError(
          `Expected an operation length at offset ${offset}, found '${text.charAt(offset)}'`,
          text,
          offset,
          lineNumber
        );
      }
      if (offset === text.length) {
        throw new CigarError(
          `Operation length '${text.slice(start)}' is not followed by an operation`,
          text,
          start,
          lineNumber
        );
      }

      const op = text.charAt(offset);
      if (!isCigarOp(op)) {
        throw new CigarError(
          `Invalid CIGAR operation '${op}' at offset ${offset}`,
          text,
          offset,
          lineNumber
        );
      }

      const size = Number.parseInt(text.slice(start, offset), 10);
      if (size > MAX_OPERATION_LENGTH) {
        throw new CigarError(
          `Operation length ${text.slice(start, offset)} is too large`,
          text,
          start,
          lineNumber
        );
      }
      cigar.elements.push(new CigarElement(size, op));
      offset++;
    }

    return cigar;
  }

  get length(): number {
    return this.elements.length;
  }

  isEmpty(): boolean {
    return this.elements.length === 0;
  }

  /** Bases consumed on the reference (M, D, N, =, X) */
  refSize(): number {
    return this.sumOver(REFERENCE_OPS);
  }

  /** Bases consumed on the read (M, I, S, =, X) */
  readSize(): number {
    return this.sumOver(READ_OPS);
  }

  /** Soft- and hard-clipped bases (S, H) */
  clipSize(): number {
    return this.sumOver(CLIP_OPS);
  }

  /**
   * True when any of the operation characters in `ops` occurs
   */
  contains(ops: string): boolean {
    return this.elements.some((element) => ops.includes(element.op));
  }

  push(size: number, op: CigarOp): this {
    this.elements.push(new CigarElement(size, op));
    return this;
  }

  pushElement(element: CigarElement): this {
    this.elements.push(element);
    return this;
  }

  append(other: Cigar): this {
    this.elements.push(...other.elements);
    return this;
  }

  /**
   * Exchange contents with `other`
   */
  swap(other: Cigar): void {
    const elements = this.elements;
    this.elements = other.elements;
    other.elements = elements;
  }

  /**
   * Merge adjacent elements with the same operation, in place
   */
  compact(): this {
    if (this.elements.length < 2) {
      return this;
    }

    const merged: CigarElement[] = [];
    for (const element of this.elements) {
      const last = merged[merged.length - 1];
      if (last !== undefined && last.op === element.op) {
        merged[merged.length - 1] = new CigarElement(last.size + element.size, last.op);
      } else {
        merged.push(element);
      }
    }
    this.elements = merged;
    return this;
  }

  reverse(): this {
    this.elements.reverse();
    return this;
  }

  clear(): void {
    this.elements = [];
  }

  at(index: number): CigarElement | undefined {
    return this.elements.at(index);
  }

  front(): CigarElement {
    return this.required(this.elements[0], "front");
  }

  back(): CigarElement {
    return this.required(this.elements[this.elements.length - 1], "back");
  }

  popFront(): CigarElement {
    return this.required(this.elements.shift(), "popFront");
  }

  popBack(): CigarElement {
    return this.required(this.elements.pop(), "popBack");
  }

  equals(other: Cigar): boolean {
    return (
      this.elements.length === other.elements.length &&
      this.elements.every((element, i) => {
        const theirs = other.elements[i];
        return theirs !== undefined && element.equals(theirs);
      })
    );
  }

  [Symbol.iterator](): Iterator<CigarElement> {
    return this.elements[Symbol.iterator]();
  }

  toString(): string {
    return this.elements.join("");
  }

  private sumOver(ops: ReadonlySet<CigarOp>): number {
    let total = 0;
    for (const element of this.elements) {
      if (ops.has(element.op)) {
        total += element.size;
      }
    }
    return total;
  }

  private required(element: CigarElement | undefined, operation: string): CigarElement {
    if (element === undefined) {
      throw new ValidationError(`Cigar.${operation}() called on an empty CIGAR`);
    }
    return element;
  }
}

// Exports
export { Cigar, CigarElement };
