/**
 * Pair orientation and template length
 *
 * Template length follows the sign convention of the TLEN column: positive
 * for the leftmost end of a pair, negative for the rightmost.
 */

import type { Cigar } from "../cigar";

/**
 * Relative strands of a read and its mate
 * - FR: forward read, reverse mate
 * - FF: both forward
 * - RR: both reverse
 * - RF: reverse read, forward mate
 */
export const Orientation = {
  FR: "FR",
  FF: "FF",
  RR: "RR",
  RF: "RF",
} as const;

export type Orientation = (typeof Orientation)[keyof typeof Orientation];

/**
 * One end of a pair as template length needs it
 */
export interface PairEnd {
  /** Leftmost mapping position */
  readonly pos: number;
  readonly cigar: Cigar;
  /** Whether the end maps to the forward strand */
  readonly forward: boolean;
}

export function computeOrientation(readForward: boolean, mateForward: boolean): Orientation {
  if (readForward !== mateForward) {
    return readForward ? Orientation.FR : Orientation.RF;
  }
  return readForward ? Orientation.FF : Orientation.RR;
}

// FF, RR and RF lengths are pushed one further from zero
function awayFromZero(length: number): number {
  if (length === 0) return 0;
  return length + (length > 0 ? 1 : -1);
}

/**
 * Signed template length of `read` against `mate`
 *
 * Swapping the arguments negates the result.
 *
 * @example
 * ```typescript
 * const read = { pos: 100, cigar: Cigar.parse("50M"), forward: true };
 * const mate = { pos: 300, cigar: Cigar.parse("50M"), forward: false };
 * computeTlen(read, mate); // 250
 * computeTlen(mate, read); // -250
 * ```
 */
export function computeTlen(read: PairEnd, mate: PairEnd): number {
  if (read.pos > mate.pos) {
    const swapped = computeTlen(mate, read);
    return swapped === 0 ? 0 : -swapped;
  }

  switch (computeOrientation(read.forward, mate.forward)) {
    case Orientation.FR:
      return mate.pos + mate.cigar.refSize() - read.pos;
    case Orientation.FF:
      return awayFromZero(mate.pos + mate.cigar.readSize() - (read.pos + read.cigar.readSize()));
    case Orientation.RR:
      return awayFromZero(mate.pos + mate.cigar.refSize() - (read.pos + read.cigar.refSize()));
    case Orientation.RF:
      return awayFromZero(mate.pos - (read.pos + read.cigar.refSize()) + 1);
  }
}
