/**
 * Header blocks of line-oriented record formats
 *
 * A header is the run of lines at the top of a document that start with one
 * of the format's start symbols (`@` for SAM, `#` for VCF). Lines are kept
 * verbatim so that writing a header back reproduces it exactly.
 */

import { ParseError } from "../../errors";

/**
 * Ordered list of raw header lines
 *
 * @example
 * ```typescript
 * const header = new Header(["#"]);
 * header.append("##fileformat=VCFv4.2");
 * header.accepts("20\t14370\t...");  // false
 * header.toString();                 // "##fileformat=VCFv4.2"
 * ```
 */
export class Header {
  readonly lines: string[] = [];

  /**
   * @param startSymbols - Accepted line prefixes; empty accepts every line
   * @param format - Format name used in error messages
   */
  constructor(
    readonly startSymbols: readonly string[] = [],
    readonly format: string = "Header"
  ) {}

  /**
   * Build a header from text holding nothing but header lines
   */
  static parse(text: string, startSymbols: readonly string[] = []): Header {
    const header = new Header(startSymbols);
    header.read(text);
    return header;
  }

  get length(): number {
    return this.lines.length;
  }

  isEmpty(): boolean {
    return this.lines.length === 0;
  }

  accepts(line: string): boolean {
    return (
      this.startSymbols.length === 0 || this.startSymbols.some((symbol) => line.startsWith(symbol))
    );
  }

  /**
   * @throws {ParseError} When the line does not start with a start symbol
   */
  append(line: string, lineNumber?: number): this {
    if (!this.accepts(line)) {
      throw new ParseError(
        `${this.format} header line must start with ${this.startSymbols.map((s) => `'${s}'`).join(" or ")}`,
        this.format,
        lineNumber,
        line
      );
    }
    this.lines.push(line);
    return this;
  }

  /**
   * Append the leading run of accepted lines starting at `start`
   *
   * @returns Index of the first line that is not a header line
   */
  consume(lines: readonly string[], start = 0): number {
    let index = start;
    for (; index < lines.length; index++) {
      const line = lines[index];
      if (line === undefined || !this.accepts(line)) {
        break;
      }
      this.lines.push(line);
    }
    return index;
  }

  /**
   * Append every line of `text`; blank lines are ignored
   *
   * @throws {ParseError} When a non-blank line is not a header line
   */
  read(text: string): this {
    const lines = text.split("\n");
    lines.forEach((raw, i) => {
      const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
      if (line !== "") {
        this.append(line, i + 1);
      }
    });
    return this;
  }

  clear(): void {
    this.lines.length = 0;
  }

  toString(): string {
    return this.lines.join("\n");
  }
}
