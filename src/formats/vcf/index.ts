/**
 * VCF variant format
 */

export { VcfHeader } from "./header";
export { VCFParser } from "./parser";
export { type VcfColumns, VcfRecord } from "./record";
export { VCFWriter } from "./writer";
