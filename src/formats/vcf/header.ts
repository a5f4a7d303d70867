/**
 * VCF header block
 */

import { Header } from "../record/header";

const FILE_FORMAT_PREFIX = "##fileformat=";
const COLUMN_HEADER_PREFIX = "#CHROM";
const FIXED_COLUMN_COUNT = 9;

/**
 * Header lines of a VCF document (lines starting with `#`)
 *
 * Meta-information (`##`) lines and the `#CHROM` column line are kept
 * verbatim; INFO/FORMAT definitions are not interpreted.
 */
export class VcfHeader extends Header {
  constructor() {
    super(["#"], "VCF");
  }

  static override parse(text: string): VcfHeader {
    const header = new VcfHeader();
    header.read(text);
    return header;
  }

  /**
   * Value of the `##fileformat=` line, e.g. "VCFv4.2"
   */
  fileFormat(): string | undefined {
    const line = this.lines.find((l) => l.startsWith(FILE_FORMAT_PREFIX));
    return line?.slice(FILE_FORMAT_PREFIX.length);
  }

  /**
   * Sample names from the `#CHROM` line; empty when there is none
   */
  sampleNames(): string[] {
    const line = this.lines.find((l) => l.startsWith(COLUMN_HEADER_PREFIX));
    return line === undefined ? [] : line.split("\t").slice(FIXED_COLUMN_COUNT);
  }
}
