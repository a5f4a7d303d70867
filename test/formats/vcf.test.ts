/**
 * Tests for VCF records, headers, parsing and writing
 */

import { describe, expect, test, vi } from "vitest";
import { FormatError, VcfError } from "../../src/errors";
import { Interval } from "../../src/operations/core/interval";
import { VcfHeader, VCFParser, VcfRecord, VCFWriter } from "../../src/formats/vcf";

const VARIANT_LINE =
  "20\t1110696\tvar_a\tG\tA,C\t55\tPASS\tDP=14;AF=0.25,0.5\tGT:DP\t0|1:7\t1/2:5\t0/0:2";
const UPSTREAM_LINE = "20\t1110695\tvar_b\tT\tC\t.\tq10\tDP=3\tGT\t0/1\t0/0\t./.";
const HEADER_TEXT = [
  "##fileformat=VCFv4.3",
  "##contig=<ID=20,length=64444167>",
  "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tsample_a\tsample_b\tsample_c",
].join("\n");

describe("VcfRecord", () => {
  test("should read the fixed columns and samples", () => {
    const record = VcfRecord.parse(VARIANT_LINE);

    expect(record.chrom).toBe("20");
    expect(record.pos).toBe(1110696);
    expect(record.id).toBe("var_a");
    expect(record.ref).toBe("G");
    expect(record.alt).toBe("A,C");
    expect(record.qual).toBe(55);
    expect(record.filter).toBe("PASS");
    expect(record.info).toBe("DP=14;AF=0.25,0.5");
    expect(record.format).toBe("GT:DP");
    expect(record.samples).toEqual(["0|1:7", "1/2:5", "0/0:2"]);
  });

  test("should cover the reference base at POS", () => {
    const interval = VcfRecord.parse(VARIANT_LINE).toInterval();
    expect(interval).toEqual(new Interval("20", 1110695, 1110696, "+"));
    expect(interval.size()).toBe(1);
  });

  test("should read a dot QUAL as missing", () => {
    const record = VcfRecord.parse(UPSTREAM_LINE);
    expect(record.qual).toBeUndefined();
    expect(record.toString()).toBe(UPSTREAM_LINE);
  });

  test("should round trip through toString", () => {
    expect(VcfRecord.parse(VARIANT_LINE).toString()).toBe(VARIANT_LINE);
  });

  test("should accept a line without samples", () => {
    const line = "X\t10\t.\tA\tT\t12.5\t.\t.\t.";
    const record = VcfRecord.parse(line);
    expect(record.samples).toEqual([]);
    expect(record.qual).toBe(12.5);
    expect(record.toString()).toBe(line);
  });

  test("should order by chromosome then position", () => {
    const upstream = VcfRecord.parse(UPSTREAM_LINE);
    const variant = VcfRecord.parse(VARIANT_LINE);

    expect(upstream.compareTo(variant)).toBeLessThan(0);
    expect(VcfRecord.compare(variant, upstream)).toBeGreaterThan(0);
    expect(upstream.equals(variant)).toBe(false);
    expect(variant.equals(VcfRecord.parse(VARIANT_LINE.replace("var_a", "var_c")))).toBe(true);
  });

  test("should report lines with too few columns", () => {
    expect(() => VcfRecord.parse("20\t1\t.\tA\tT\t1\tPASS\t.")).toThrow(
      "VCF line has 8 fields, expected at least 9"
    );
    expect(() => VcfRecord.parse("20\t1")).toThrow(FormatError);
  });

  test("should report a bad POS or QUAL", () => {
    expect(() => VcfRecord.parse(VARIANT_LINE.replace("1110696", "x"))).toThrow(VcfError);
    expect(() => VcfRecord.parse(VARIANT_LINE.replace("\t55\t", "\tinf\t"))).toThrow(VcfError);
  });

  test("should name the chromosome in column errors", () => {
    try {
      VcfRecord.parse(VARIANT_LINE.replace("\t55\t", "\tabc\t"), undefined, 8);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(VcfError);
      if (error instanceof VcfError) {
        expect(error.chrom).toBe("20");
        expect(error.lineNumber).toBe(8);
      }
    }
  });

  test("should leave the record unchanged when a read fails", () => {
    const record = VcfRecord.parse(VARIANT_LINE);
    expect(() => record.read("20\tbad\t.\tA\tT\t1\tPASS\t.\t.")).toThrow(VcfError);
    expect(record.pos).toBe(1110696);
  });
});

describe("VcfHeader", () => {
  test("should find the file format", () => {
    expect(VcfHeader.parse(HEADER_TEXT).fileFormat()).toBe("VCFv4.3");
    expect(new VcfHeader().fileFormat()).toBeUndefined();
  });

  test("should list sample names", () => {
    expect(VcfHeader.parse(HEADER_TEXT).sampleNames()).toEqual([
      "sample_a",
      "sample_b",
      "sample_c",
    ]);
    expect(VcfHeader.parse("##fileformat=VCFv4.3").sampleNames()).toEqual([]);
  });

  test("should round trip through toString", () => {
    expect(VcfHeader.parse(HEADER_TEXT).toString()).toBe(HEADER_TEXT);
  });
});

describe("VCFParser", () => {
  const document = `${HEADER_TEXT}\n${UPSTREAM_LINE}\n${VARIANT_LINE}\n`;

  test("should read the header and records", async () => {
    const { header, records } = await new VCFParser().readDocument(document);

    expect(header.length).toBe(3);
    expect(header.sampleNames()).toHaveLength(3);
    expect(records.map((record) => record.pos)).toEqual([1110695, 1110696]);
    expect(records[0]?.header).toBe(header);
  });

  test("should warn about header lines after the first record", async () => {
    const onWarning = vi.fn();
    const { records } = await new VCFParser({ onWarning }).readDocument(
      `${UPSTREAM_LINE}\n##late=1\n${VARIANT_LINE}`
    );

    expect(onWarning).toHaveBeenCalledWith("Header line after the first record is ignored", 2);
    expect(records).toHaveLength(2);
  });

  test("should throw a VcfError for a bad record by default", async () => {
    await expect(new VCFParser().readDocument("20\t1")).rejects.toBeInstanceOf(VcfError);
  });

  test("should pass bad records to a custom error handler", async () => {
    const onError = vi.fn();
    const { records } = await new VCFParser({ onError }).readDocument(
      `${UPSTREAM_LINE}\n20\t1\n${VARIANT_LINE}`
    );

    expect(onError).toHaveBeenCalledWith("VCF line has 2 fields, expected at least 9", 2);
    expect(records).toHaveLength(2);
  });
});

describe("VCFWriter", () => {
  test("should reproduce a parsed document", async () => {
    const document = `${HEADER_TEXT}\n${UPSTREAM_LINE}\n${VARIANT_LINE}\n`;
    const { header, records } = await new VCFParser().readDocument(document);
    expect(new VCFWriter().formatString(header, records)).toBe(document);
  });

  test("should write records sorted by position", () => {
    const records = [VcfRecord.parse(VARIANT_LINE), VcfRecord.parse(UPSTREAM_LINE)].sort(
      VcfRecord.compare
    );
    expect(new VCFWriter().formatString(undefined, records)).toBe(
      `${UPSTREAM_LINE}\n${VARIANT_LINE}\n`
    );
  });
});
