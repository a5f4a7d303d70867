/**
 * Quality score operations
 *
 * @module operations/core/quality
 *
 * @example
 * ```typescript
 * import { charToScore, qualToErrorProb } from "./operations/core/quality";
 *
 * qualToErrorProb(charToScore("5")); // 0.01
 * ```
 */

export type { QualityScore } from "./types";
export {
  ASCII_OFFSET,
  GAP_CONTINUATION_QUALITY,
  GAP_OPEN_QUALITY,
  QUALITY_TABLE_SIZE,
  isValidQualityScore,
} from "./types";

export { charToScore, scoreToChar, toNumbers, uniformQuality } from "./conversion";

export {
  phredScaleErrorRate,
  qualToErrorProb,
  qualToErrorProbLog10,
  qualToProbLog10,
} from "./probability";
