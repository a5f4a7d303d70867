/**
 * SAM alignment format
 *
 * - Alignment records with derived geometry
 * - Header block with structured `@HD/@SQ/@RG/@PG/@CO` views
 * - Flag decoding, orientation and template length helpers
 */

export { decodeFlag, type DecodedFlag, hasFlag, SamFlag } from "./flags";
export { computeOrientation, computeTlen, Orientation, type PairEnd } from "./geometry";
export {
  type ReferenceSequence,
  SamHeader,
  type SamHeaderEntry,
  type SamHeaderType,
} from "./header";
export { SAMParser } from "./parser";
export { type SamColumns, SamRecord } from "./record";
export { parseTag, type SamTag } from "./tags";
export { SAMWriter } from "./writer";
