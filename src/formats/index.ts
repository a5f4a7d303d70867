/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { Cigar, SAMParser, VCFParser } from "../formats";
 * ```
 */

export { Cigar, CigarElement, CigarOp } from "./cigar";
export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
export * from "./record";
export * from "./sam";
export * from "./vcf";
