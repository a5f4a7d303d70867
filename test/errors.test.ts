/**
 * Tests for the error hierarchy and recovery suggestions
 */

import { describe, expect, test } from "vitest";
import {
  BiorecordError,
  CigarError,
  DomainError,
  ERROR_SUGGESTIONS,
  FileError,
  FormatError,
  getErrorSuggestion,
  ParseError,
  SamError,
  ValidationError,
} from "../src/errors";

describe("BiorecordError", () => {
  test("should include line number and context in toString", () => {
    const error = new ParseError("bad column", "SAM", 3, "r1\t99");
    expect(error.toString()).toBe("ParseError: bad column (line 3)\nContext: r1\t99");
  });

  test("should omit missing details in toString", () => {
    expect(new ValidationError("nope").toString()).toBe("ValidationError: nope");
  });

  test("should point at the failing CIGAR offset", () => {
    const error = new CigarError("Invalid CIGAR operation 'Q' at offset 2", "10Q", 2);
    expect(error.toString()).toBe(
      "CigarError: Invalid CIGAR operation 'Q' at offset 2\nContext: CIGAR: 10Q\n  10Q\n    ^"
    );
  });

  test("should keep the hierarchy", () => {
    const error = new SamError("bad", "r1");
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toBeInstanceOf(BiorecordError);
    expect(error.format).toBe("SAM");
    expect(error.code).toBe("PARSE_ERROR");
  });
});

describe("FileError.fromSystemError", () => {
  test("should add a suggestion for a missing file", () => {
    const error = FileError.fromSystemError(
      "read",
      "/data/in.sam",
      new Error("ENOENT: no such file or directory")
    );
    expect(error.message).toBe(
      "read operation failed: ENOENT: no such file or directory. " +
        "Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("/data/in.sam");
    expect(error.operation).toBe("read");
  });

  test("should pass an existing FileError through", () => {
    const original = new FileError("gone", "/x", "stat");
    expect(FileError.fromSystemError("read", "/y", original)).toBe(original);
  });
});

describe("getErrorSuggestion", () => {
  test("should match suggestions to error kinds", () => {
    expect(getErrorSuggestion(FormatError.forFieldCount("VCF", 9, 3, true))).toBe(
      ERROR_SUGGESTIONS.FIELD_COUNT
    );
    expect(getErrorSuggestion(new CigarError("bad", "5Q"))).toBe(ERROR_SUGGESTIONS.INVALID_CIGAR);
    expect(getErrorSuggestion(DomainError.forInvertedRange("chr1", 9, 3))).toBe(
      ERROR_SUGGESTIONS.INTERVAL_DOMAIN
    );
    expect(getErrorSuggestion(new ParseError("bad", "Interval"))).toBe(
      ERROR_SUGGESTIONS.INVALID_INTERVAL
    );
    expect(getErrorSuggestion(new SamError("pos must be an unsigned 32-bit integer"))).toBe(
      ERROR_SUGGESTIONS.INVALID_NUMBER
    );
    expect(getErrorSuggestion(new SamError("odd line"))).toBe(ERROR_SUGGESTIONS.MALFORMED_LINE);
  });
});
