/**
 * Generic record and header line codecs
 */

export {
  bitmaskField,
  FloatField,
  formatOptionalFloat,
  I32Field,
  MISSING_VALUE,
  OptionalFloatField,
  TailField,
  TextField,
  U16Field,
  U32Field,
} from "./fields";
export { Header } from "./header";
export { type ColumnFormatters, LineCodec, type LineSchema, type RawColumns } from "./line-codec";
export { TextRecordParser } from "./parser";
export { comparePositions, type HeaderableRecord, type TextDocument } from "./record";
export { TextRecordWriter } from "./writer";
