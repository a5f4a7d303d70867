/**
 * Phred score to probability lookups
 *
 * Tables are computed once at module load for every score in [0, 127], so
 * per-base conversions are a single array read.
 */

import { ValidationError } from "../../../errors";
import { QUALITY_TABLE_SIZE, isValidQualityScore } from "./types";

const ERROR_PROBABILITY: readonly number[] = Array.from(
  { length: QUALITY_TABLE_SIZE },
  (_, q) => 10 ** (-q / 10)
);

const ERROR_PROBABILITY_LOG10: readonly number[] = Array.from(
  { length: QUALITY_TABLE_SIZE },
  (_, q) => -q / 10
);

const PROBABILITY_LOG10: readonly number[] = ERROR_PROBABILITY.map((p) => Math.log10(1 - p));

function lookup(table: readonly number[], score: number): number {
  const value = isValidQualityScore(score) ? table[score] : undefined;
  if (value === undefined) {
    throw new ValidationError(`Quality score ${score} is outside the valid range 0-127`);
  }
  return value;
}

/**
 * Probability that a base call with quality `score` is wrong: 10^(-score/10)
 *
 * @example
 * ```typescript
 * qualToErrorProb(20); // 0.01
 * ```
 */
export function qualToErrorProb(score: number): number {
  return lookup(ERROR_PROBABILITY, score);
}

/**
 * log10 of the error probability, i.e. -score/10
 */
export function qualToErrorProbLog10(score: number): number {
  return lookup(ERROR_PROBABILITY_LOG10, score);
}

/**
 * log10 of the probability that the call is right; -Infinity at score 0
 */
export function qualToProbLog10(score: number): number {
  return lookup(PROBABILITY_LOG10, score);
}

/**
 * Phred-scale an error rate: -10 * log10(rate)
 *
 * @throws {ValidationError} When rate is not in (0, 1]
 */
export function phredScaleErrorRate(rate: number): number {
  if (!(rate > 0 && rate <= 1)) {
    throw new ValidationError(`Error rate must be in (0, 1], got ${rate}`);
  }
  return -10 * Math.log10(rate);
}
