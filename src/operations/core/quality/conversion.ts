/**
 * Conversions between Phred+33 characters and numeric scores
 */

import { ValidationError } from "../../../errors";
import type { QualityScore } from "./types";
import { ASCII_OFFSET, isValidQualityScore } from "./types";

/**
 * Convert one Phred+33 quality character to its score
 *
 * @throws {ValidationError} When the character does not encode a score in [0, 127]
 *
 * @example
 * ```typescript
 * charToScore("I"); // 40
 * charToScore("!"); // 0
 * ```
 */
export function charToScore(char: string): QualityScore {
  const score = char.charCodeAt(0) - ASCII_OFFSET;
  if (char.length !== 1 || !isValidQualityScore(score)) {
    throw new ValidationError(
      `Invalid quality character '${char}': expected one character from '!' upwards`
    );
  }
  return score;
}

/**
 * Convert a score to its Phred+33 character
 *
 * @throws {ValidationError} When score is not an integer in [0, 127]
 */
export function scoreToChar(score: number): string {
  if (!isValidQualityScore(score)) {
    throw new ValidationError(`Quality score ${score} is outside the valid range 0-127`);
  }
  return String.fromCharCode(score + ASCII_OFFSET);
}

/**
 * Decode a whole quality string into scores
 */
export function toNumbers(quality: string): QualityScore[] {
  const scores: QualityScore[] = [];
  for (const char of quality) {
    scores.push(charToScore(char));
  }
  return scores;
}

/**
 * A quality string of `length` copies of one score
 */
export function uniformQuality(score: number, length: number): string {
  return scoreToChar(score).repeat(length);
}
