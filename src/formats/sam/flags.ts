/**
 * SAM FLAG bits and predicates
 */

/**
 * The twelve bits of the SAM FLAG column
 */
export const SamFlag = {
  READ_PAIRED: 0x1,
  PROPER_PAIR: 0x2,
  READ_UNMAPPED: 0x4,
  MATE_UNMAPPED: 0x8,
  READ_REVERSE_STRAND: 0x10,
  MATE_REVERSE_STRAND: 0x20,
  FIRST_OF_PAIR: 0x40,
  SECOND_OF_PAIR: 0x80,
  SECONDARY_ALIGNMENT: 0x100,
  READ_FAILS_QUALITY_CHECK: 0x200,
  DUPLICATE_READ: 0x400,
  SUPPLEMENTARY_ALIGNMENT: 0x800,
} as const;

export type SamFlag = (typeof SamFlag)[keyof typeof SamFlag];

/**
 * Every flag bit as a named boolean
 */
export interface DecodedFlag {
  readonly readPaired: boolean;
  readonly properPair: boolean;
  readonly readUnmapped: boolean;
  readonly mateUnmapped: boolean;
  readonly readReverseStrand: boolean;
  readonly mateReverseStrand: boolean;
  readonly firstOfPair: boolean;
  readonly secondOfPair: boolean;
  readonly secondaryAlignment: boolean;
  readonly readFailsQualityCheck: boolean;
  readonly duplicateRead: boolean;
  readonly supplementaryAlignment: boolean;
}

export function hasFlag(flag: number, bit: SamFlag): boolean {
  return (flag & bit) !== 0;
}

/**
 * Decode a FLAG value into its twelve bits
 *
 * @example
 * ```typescript
 * const decoded = decodeFlag(99);
 * decoded.readPaired;        // true
 * decoded.mateReverseStrand; // true
 * decoded.readReverseStrand; // false
 * ```
 */
export function decodeFlag(flag: number): DecodedFlag {
  return {
    readPaired: hasFlag(flag, SamFlag.READ_PAIRED),
    properPair: hasFlag(flag, SamFlag.PROPER_PAIR),
    readUnmapped: hasFlag(flag, SamFlag.READ_UNMAPPED),
    mateUnmapped: hasFlag(flag, SamFlag.MATE_UNMAPPED),
    readReverseStrand: hasFlag(flag, SamFlag.READ_REVERSE_STRAND),
    mateReverseStrand: hasFlag(flag, SamFlag.MATE_REVERSE_STRAND),
    firstOfPair: hasFlag(flag, SamFlag.FIRST_OF_PAIR),
    secondOfPair: hasFlag(flag, SamFlag.SECOND_OF_PAIR),
    secondaryAlignment: hasFlag(flag, SamFlag.SECONDARY_ALIGNMENT),
    readFailsQualityCheck: hasFlag(flag, SamFlag.READ_FAILS_QUALITY_CHECK),
    duplicateRead: hasFlag(flag, SamFlag.DUPLICATE_READ),
    supplementaryAlignment: hasFlag(flag, SamFlag.SUPPLEMENTARY_ALIGNMENT),
  };
}
