/**
 * Tests for half-open genomic intervals
 */

import { describe, expect, test } from "vitest";
import { DomainError, ParseError } from "../../../src/errors";
import { Interval } from "../../../src/operations/core/interval";
import { MAX_POSITION } from "../../../src/types";

describe("Interval", () => {
  describe("construction", () => {
    test("should default to the forward strand", () => {
      const interval = new Interval("chr1", 100, 200);
      expect(interval.strand).toBe("+");
      expect(interval.size()).toBe(100);
      expect(interval.isEmpty()).toBe(false);
    });

    test("should allow empty intervals", () => {
      expect(new Interval("chr1", 5, 5).isEmpty()).toBe(true);
    });

    test("should reject an end before the begin", () => {
      expect(() => new Interval("chr1", 200, 100)).toThrow(DomainError);
    });

    test("should reject an invalid strand", () => {
      expect(() => new Interval("chr1", 1, 2, "x")).toThrow(DomainError);
      expect(() => new Interval("chr1", 1, 2, "+-")).toThrow(
        "Invalid strand '+-', expected '+' or '-'"
      );
      expect(() => new Interval("chr1", 1, 2, "")).toThrow(DomainError);
    });

    test("should accept both strand symbols", () => {
      expect(new Interval("chr1", 1, 2, "-").strand).toBe("-");
      expect(new Interval("chr1", 1, 2, "+").strand).toBe("+");
    });

    test("should reject coordinates outside the unsigned 32-bit range", () => {
      expect(() => new Interval("chr1", -1, 2)).toThrow(DomainError);
      expect(() => new Interval("chr1", 1.5, 2)).toThrow(DomainError);
      expect(() => new Interval("chr1", 0, MAX_POSITION + 1)).toThrow(DomainError);
    });
  });

  describe("parse", () => {
    test("should read a whole chromosome when no range is given", () => {
      const interval = Interval.parse("chr1");
      expect(interval.chrom).toBe("chr1");
      expect(interval.begin).toBe(0);
      expect(interval.end).toBe(MAX_POSITION);
      expect(interval.strand).toBe("+");
    });

    test("should read a strand prefix and a range", () => {
      const interval = Interval.parse("-chr2:100-200");
      expect(interval.strand).toBe("-");
      expect(interval.chrom).toBe("chr2");
      expect(interval.begin).toBe(100);
      expect(interval.end).toBe(200);
    });

    test("should ignore commas in coordinates", () => {
      const interval = Interval.parse("chr1:1,000-2,000");
      expect(interval.begin).toBe(1000);
      expect(interval.end).toBe(2000);
    });

    test("should read a single position as one base", () => {
      const interval = Interval.parse("chr3:1,500");
      expect(interval.begin).toBe(1500);
      expect(interval.end).toBe(1501);
    });

    test("should run to the chromosome end after a trailing plus", () => {
      const interval = Interval.parse("chr3:1500+");
      expect(interval.begin).toBe(1500);
      expect(interval.end).toBe(MAX_POSITION);
    });

    test("should reject malformed text", () => {
      expect(() => Interval.parse("")).toThrow(ParseError);
      expect(() => Interval.parse(":5-10")).toThrow(ParseError);
      expect(() => Interval.parse("chr1:abc")).toThrow(ParseError);
      expect(() => Interval.parse("chr1:10-")).toThrow(ParseError);
      expect(() => Interval.parse("chr1:200-100")).toThrow(ParseError);
      expect(() => Interval.parse("chr1:4294967296")).toThrow(ParseError);
    });

    test("should round trip through toString", () => {
      const interval = Interval.parse("-chrX:10-20");
      expect(interval.toString()).toBe("-chrX:10-20");
      expect(Interval.parse(interval.toString()).equals(interval)).toBe(true);
    });
  });

  describe("overlaps", () => {
    const a = new Interval("chr1", 100, 200);

    test("should detect shared bases", () => {
      expect(a.overlaps(new Interval("chr1", 199, 300))).toBe(true);
      expect(new Interval("chr1", 50, 101).overlaps(a)).toBe(true);
    });

    test("should treat intervals as half-open", () => {
      expect(a.overlaps(new Interval("chr1", 200, 300))).toBe(false);
      expect(a.overlaps(new Interval("chr1", 0, 100))).toBe(false);
    });

    test("should require the same chromosome and strand", () => {
      expect(a.overlaps(new Interval("chr2", 150, 160))).toBe(false);
      expect(a.overlaps(new Interval("chr1", 150, 160, "-"))).toBe(false);
    });
  });

  describe("contains", () => {
    const a = new Interval("chr1", 100, 200);

    test("should contain nested intervals and itself", () => {
      expect(a.contains(new Interval("chr1", 150, 160))).toBe(true);
      expect(a.contains(a)).toBe(true);
    });

    test("should not contain partially overlapping intervals", () => {
      expect(a.contains(new Interval("chr1", 150, 250))).toBe(false);
    });

    test("should require the same strand", () => {
      expect(a.contains(new Interval("chr1", 150, 160, "-"))).toBe(false);
    });
  });

  describe("spanWith", () => {
    test("should cover both intervals", () => {
      const a = new Interval("chr1", 100, 200);
      const b = new Interval("chr1", 300, 400);
      const span = a.spanWith(b);

      expect(span.begin).toBe(100);
      expect(span.end).toBe(400);
      expect(span.contains(a)).toBe(true);
      expect(span.contains(b)).toBe(true);
    });

    test("should refuse different chromosomes", () => {
      const a = new Interval("chr1", 100, 200);
      expect(() => a.spanWith(new Interval("chr2", 100, 200))).toThrow(
        "Interval.spanWith(): cannot combine intervals on different chroms"
      );
    });

    test("should refuse different strands", () => {
      const a = new Interval("chr1", 100, 200);
      expect(() => a.spanWith(new Interval("chr1", 100, 200, "-"))).toThrow(DomainError);
    });
  });

  describe("expandWith", () => {
    test("should widen both ends", () => {
      const expanded = new Interval("chr1", 100, 200).expandWith(50);
      expect(expanded.begin).toBe(50);
      expect(expanded.end).toBe(250);
    });

    test("should saturate at zero and at the maximum position", () => {
      expect(new Interval("chr1", 100, 200).expandWith(500).begin).toBe(0);
      const nearEnd = new Interval("chr1", MAX_POSITION - 10, MAX_POSITION).expandWith(100);
      expect(nearEnd.begin).toBe(MAX_POSITION - 110);
      expect(nearEnd.end).toBe(MAX_POSITION);
    });

    test("should reject negative or fractional padding", () => {
      const interval = new Interval("chr1", 100, 200);
      expect(() => interval.expandWith(-1)).toThrow(DomainError);
      expect(() => interval.expandWith(1.5)).toThrow(DomainError);
    });
  });

  describe("ordering", () => {
    test("should order by chrom, begin, end and strand", () => {
      const sorted = [
        new Interval("chr2", 0, 1),
        new Interval("chr1", 5, 10),
        new Interval("chr10", 0, 1),
        new Interval("chr1", 5, 8, "-"),
        new Interval("chr1", 5, 8),
      ]
        .sort(Interval.compare)
        .map((interval) => interval.toString());

      expect(sorted).toEqual([
        "+chr1:5-8",
        "-chr1:5-8",
        "+chr1:5-10",
        "+chr10:0-1",
        "+chr2:0-1",
      ]);
    });

    test("should compare equal intervals as equal", () => {
      const a = new Interval("chr1", 1, 2);
      expect(a.compareTo(new Interval("chr1", 1, 2))).toBe(0);
      expect(a.equals(new Interval("chr1", 1, 3))).toBe(false);
    });
  });
});
