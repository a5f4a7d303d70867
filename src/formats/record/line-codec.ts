/**
 * Schema-driven line codec
 *
 * A record type describes its columns once, as an ordered list of keys plus
 * an ArkType object type that morphs raw column text into typed values.
 * `decode` and `encode` then work for any record without per-type parsing
 * code:
 *
 * ```
 * "r1\t99\tchr1" --split--> { qname: "r1", flag: "99", rname: "chr1" }
 *                --schema--> { qname: "r1", flag: 99, rname: "chr1" }
 * ```
 */

import { type, type ArkErrors } from "arktype";
import { FormatError, ParseError } from "../../errors";

/** Raw column text keyed by column name, before the schema runs */
export type RawColumns = Record<string, string | string[]>;

/** Column-to-text formatters; columns without one use `String(value)` */
export type ColumnFormatters<T> = {
  readonly [K in keyof T]?: (value: T[K]) => string;
};

/**
 * Explicit description of one record layout
 */
export interface LineSchema<T extends object> {
  /** Format name used in error messages */
  readonly format: string;
  /** Column separator (default: tab) */
  readonly delimiter?: string;
  /** Fixed columns in line order */
  readonly columns: readonly (keyof T & string)[];
  /** Column that collects every surplus field as `string[]` */
  readonly tail?: keyof T & string;
  /** ArkType morph from raw columns to the typed record */
  readonly validate: (raw: RawColumns) => T | ArkErrors;
  readonly formatters?: ColumnFormatters<T>;
  /** Builds the error raised for a line whose columns fail validation */
  readonly createError?: (
    message: string,
    fields: readonly string[],
    lineNumber?: number,
    line?: string
  ) => ParseError;
}

/**
 * Encoder and decoder for one record layout
 *
 * @example
 * ```typescript
 * const PairSchema = type({ name: TextField, count: U32Field });
 * const codec = new LineCodec({
 *   format: "PAIR",
 *   columns: ["name", "count"],
 *   validate: (raw) => PairSchema(raw),
 * });
 * codec.decode("a\t1");                      // { name: "a", count: 1 }
 * codec.encode({ name: "b", count: 2 });     // "b\t2"
 * ```
 */
export class LineCodec<T extends object> {
  readonly format: string;
  readonly delimiter: string;

  constructor(private readonly schema: LineSchema<T>) {
    if (schema.columns.length === 0) {
      throw new ParseError("A line schema needs at least one column", schema.format);
    }
    this.format = schema.format;
    this.delimiter = schema.delimiter ?? "\t";
  }

  /** Number of fixed columns */
  get width(): number {
    return this.schema.columns.length;
  }

  /**
   * Split `line` and morph its columns into a new record value
   *
   * @throws {FormatError} When the column count does not match the layout
   * @throws {ParseError} When a column fails its codec
   */
  decode(line: string, lineNumber?: number): T {
    const { columns, tail } = this.schema;
    const fields = line.split(this.delimiter);

    const countMatches =
      tail === undefined ? fields.length === columns.length : fields.length >= columns.length;
    if (!countMatches) {
      throw FormatError.forFieldCount(
        this.format,
        columns.length,
        fields.length,
        tail !== undefined,
        lineNumber,
        line
      );
    }

    const raw: RawColumns = {};
    columns.forEach((column, i) => {
      raw[column] = fields[i] ?? "";
    });
    if (tail !== undefined) {
      raw[tail] = fields.slice(columns.length);
    }

    const result = this.schema.validate(raw);
    if (result instanceof type.errors) {
      const message = `Invalid ${this.format} line: ${result.summary}`;
      throw this.schema.createError !== undefined
        ? this.schema.createError(message, fields, lineNumber, line)
        : new ParseError(message, this.format, lineNumber, line);
    }
    return result;
  }

  /**
   * Join the formatted columns; an empty tail adds no trailing delimiter
   */
  encode(values: T): string {
    const fields = this.schema.columns.map((column) => this.formatColumn(column, values));
    const { tail } = this.schema;
    if (tail !== undefined) {
      const rest = this.formatColumn(tail, values);
      if (rest !== "") {
        fields.push(rest);
      }
    }
    return fields.join(this.delimiter);
  }

  private formatColumn<K extends keyof T>(column: K, values: T): string {
    const value = values[column];
    const formatter = this.schema.formatters?.[column];
    if (formatter !== undefined) {
      return formatter(value);
    }
    if (Array.isArray(value)) {
      return value.join(this.delimiter);
    }
    return String(value);
  }
}
