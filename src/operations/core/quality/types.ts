/**
 * Shared types for Phred quality scores
 *
 * Alignment records store qualities as Phred+33 text. Scores are branded
 * so a value that passed range validation can be told apart from an
 * arbitrary number at compile time.
 */

// ============================================================================
// BRANDED TYPES FOR COMPILE-TIME SAFETY
// ============================================================================

/**
 * Branded Phred quality score covered by the probability table
 * @minimum 0
 * @maximum 127
 */
export type QualityScore = number & {
  readonly __brand: "QualityScore";
  readonly __min: 0;
  readonly __max: 127;
};

/** ASCII offset of Phred+33 quality text */
export const ASCII_OFFSET = 33;

/** Number of entries in the quality lookup tables */
export const QUALITY_TABLE_SIZE = 128;

/** Quality assigned to gap opening in gap-penalty strings ('I') */
export const GAP_OPEN_QUALITY = 40;

/** Quality assigned to gap continuation in gap-penalty strings ('+') */
export const GAP_CONTINUATION_QUALITY = 10;

/**
 * Type guard for scores covered by the lookup tables
 */
export const isValidQualityScore = (score: number): score is QualityScore => {
  return Number.isInteger(score) && score >= 0 && score < QUALITY_TABLE_SIZE;
};
