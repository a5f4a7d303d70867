/**
 * Tests for Phred quality conversions and probability tables
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../../src/errors";
import {
  charToScore,
  phredScaleErrorRate,
  qualToErrorProb,
  qualToErrorProbLog10,
  qualToProbLog10,
  scoreToChar,
  toNumbers,
  uniformQuality,
} from "../../../src/operations/core/quality";

describe("Quality conversion", () => {
  test("should convert Phred+33 characters to scores", () => {
    expect(charToScore("!")).toBe(0);
    expect(charToScore("+")).toBe(10);
    expect(charToScore("I")).toBe(40);
  });

  test("should convert scores to Phred+33 characters", () => {
    expect(scoreToChar(0)).toBe("!");
    expect(scoreToChar(40)).toBe("I");
  });

  test("should decode whole quality strings", () => {
    expect(toNumbers("!+5I")).toEqual([0, 10, 20, 40]);
  });

  test("should build uniform quality strings", () => {
    expect(uniformQuality(40, 3)).toBe("III");
    expect(uniformQuality(10, 0)).toBe("");
  });

  test("should reject characters below the offset", () => {
    expect(() => charToScore(" ")).toThrow(ValidationError);
    expect(() => charToScore("II")).toThrow(ValidationError);
  });

  test("should reject scores outside the table", () => {
    expect(() => scoreToChar(128)).toThrow(ValidationError);
    expect(() => scoreToChar(-1)).toThrow(ValidationError);
  });
});

describe("Quality probabilities", () => {
  test("should map scores to error probabilities", () => {
    expect(qualToErrorProb(0)).toBe(1);
    expect(qualToErrorProb(10)).toBeCloseTo(0.1, 12);
    expect(qualToErrorProb(20)).toBeCloseTo(0.01, 12);
    expect(qualToErrorProb(30)).toBeCloseTo(0.001, 12);
  });

  test("should give log10 error probabilities", () => {
    expect(qualToErrorProbLog10(30)).toBe(-3);
    expect(qualToErrorProbLog10(0)).toBeCloseTo(0, 12);
  });

  test("should give log10 probabilities of a correct call", () => {
    expect(qualToProbLog10(0)).toBe(-Infinity);
    expect(qualToProbLog10(20)).toBeCloseTo(Math.log10(0.99), 12);
  });

  test("should reject scores outside the table", () => {
    expect(() => qualToErrorProb(128)).toThrow(ValidationError);
    expect(() => qualToErrorProb(-1)).toThrow(ValidationError);
    expect(() => qualToErrorProb(2.5)).toThrow(ValidationError);
  });

  test("should Phred-scale error rates", () => {
    expect(phredScaleErrorRate(0.001)).toBeCloseTo(30, 10);
    expect(phredScaleErrorRate(1)).toBeCloseTo(0, 10);
    expect(() => phredScaleErrorRate(0)).toThrow(ValidationError);
    expect(() => phredScaleErrorRate(1.5)).toThrow(ValidationError);
  });
});
