/**
 * Column codecs for delimited record lines
 *
 * Each parser is an ArkType morph from the raw column text to its typed
 * value, so a record schema is an ordinary `type({...})` object whose
 * properties are these morphs. Failures surface as ArkType errors naming
 * the column and what it must be.
 */

import { type } from "arktype";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Marker for a missing value in optional columns */
export const MISSING_VALUE = ".";

/**
 * Integer column bounded to `[min, max]`
 */
function integerField(min: number, max: number, description: string) {
  return type("string").pipe((text: string, ctx) => {
    if (!INTEGER_PATTERN.test(text)) {
      return ctx.error(description);
    }
    const value = Number.parseInt(text, 10);
    if (value < min || value > max) {
      return ctx.error(description);
    }
    return value;
  });
}

/** Verbatim text */
export const TextField = type("string");

/** Unsigned 16-bit integer */
export const U16Field = integerField(0, 0xffff, "an unsigned 16-bit integer");

/** Unsigned 32-bit integer */
export const U32Field = integerField(0, 0xffff_ffff, "an unsigned 32-bit integer");

/** Signed 32-bit integer */
export const I32Field = integerField(-0x8000_0000, 0x7fff_ffff, "a signed 32-bit integer");

/**
 * Bit field of `bits` width, stored as its integer value
 */
export const bitmaskField = (bits: number) =>
  integerField(0, 2 ** bits - 1, `a ${bits}-bit flag value`);

/** Decimal or exponent notation; `inf` and `nan` are rejected */
export const FloatField = type("string").pipe((text: string, ctx) => {
  if (!FLOAT_PATTERN.test(text)) {
    return ctx.error("a decimal number");
  }
  return Number.parseFloat(text);
});

/** Like FloatField, with `.` read as a missing value */
export const OptionalFloatField = type("string").pipe((text: string, ctx) => {
  if (text === MISSING_VALUE) {
    return undefined;
  }
  if (!FLOAT_PATTERN.test(text)) {
    return ctx.error(`a decimal number or '${MISSING_VALUE}'`);
  }
  return Number.parseFloat(text);
});

/** Every column after the fixed ones */
export const TailField = type("string[]");

/**
 * Formatter for OptionalFloatField values
 */
export function formatOptionalFloat(value: number | undefined): string {
  return value === undefined ? MISSING_VALUE : String(value);
}
