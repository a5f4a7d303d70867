/**
 * biorecord - typed SAM and VCF records with genomic interval arithmetic
 *
 * Converts tab-delimited alignment and variant lines to typed records and
 * back, and answers geometric questions about them: CIGAR lengths, pair
 * orientation, template length, interval overlap and containment.
 */

// Error types
export {
  BiorecordError,
  CigarError,
  DomainError,
  ERROR_SUGGESTIONS,
  FileError,
  FormatError,
  getErrorSuggestion,
  ParseError,
  SamError,
  StreamError,
  ValidationError,
  VcfError,
} from "./errors";
// CIGAR
export { Cigar, CigarElement, CigarOp } from "./formats/cigar";
// Parser base
export { AbstractParser, type ResolvedParserOptions } from "./formats/abstract-parser";
// Generic record and header codecs
export {
  bitmaskField,
  type ColumnFormatters,
  comparePositions,
  FloatField,
  formatOptionalFloat,
  Header,
  type HeaderableRecord,
  I32Field,
  LineCodec,
  type LineSchema,
  MISSING_VALUE,
  OptionalFloatField,
  type RawColumns,
  TailField,
  TextField,
  type TextDocument,
  TextRecordParser,
  TextRecordWriter,
  U16Field,
  U32Field,
} from "./formats/record";
// SAM format
export {
  computeOrientation,
  computeTlen,
  type DecodedFlag,
  decodeFlag,
  hasFlag,
  Orientation,
  type PairEnd,
  parseTag,
  type ReferenceSequence,
  type SamColumns,
  SamFlag,
  SamHeader,
  type SamHeaderEntry,
  type SamHeaderType,
  SAMParser,
  SamRecord,
  type SamTag,
  SAMWriter,
} from "./formats/sam";
// VCF format
export { type VcfColumns, VcfHeader, VCFParser, VcfRecord, VCFWriter } from "./formats/vcf";
// File I/O
export { createStream, exists, getMetadata, readToString } from "./io/file-reader";
export { appendString, writeString } from "./io/file-writer";
export { processBuffer, readLines } from "./io/stream-utils";
// Intervals and qualities
export { Interval } from "./operations/core/interval";
export {
  ASCII_OFFSET,
  charToScore,
  GAP_CONTINUATION_QUALITY,
  GAP_OPEN_QUALITY,
  isValidQualityScore,
  phredScaleErrorRate,
  QUALITY_TABLE_SIZE,
  type QualityScore,
  qualToErrorProb,
  qualToErrorProbLog10,
  qualToProbLog10,
  scoreToChar,
  toNumbers,
  uniformQuality,
} from "./operations/core/quality";
// Core types
export type {
  FileMetadata,
  FilePath,
  FileReaderOptions,
  LineProcessingResult,
  ParserOptions,
  Strand,
} from "./types";
export { FilePathSchema, MAX_POSITION, StrandSchema } from "./types";
