/**
 * SAM optional fields (`TAG:TYPE:VALUE`)
 *
 * Optional fields are stored verbatim on the record; this module decodes
 * them on request.
 */

import { SamError } from "../../errors";

export type SamTag =
  | { readonly tag: string; readonly type: "A" | "Z" | "H"; readonly value: string }
  | { readonly tag: string; readonly type: "i" | "f"; readonly value: number }
  | {
      readonly tag: string;
      readonly type: "B";
      /** Element type of the array: one of cCsSiIf */
      readonly subtype: string;
      readonly value: number[];
    };

const TAG_PATTERN = /^[A-Za-z][A-Za-z0-9]$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ARRAY_SUBTYPES = "cCsSiIf";

function parseNumber(text: string, integer: boolean, field: string): number {
  if (!(integer ? INTEGER_PATTERN : FLOAT_PATTERN).test(text)) {
    throw new SamError(
      `Invalid ${integer ? "integer" : "float"} value '${text}' in optional field ${field}`,
      undefined,
      "tag"
    );
  }
  return integer ? Number.parseInt(text, 10) : Number.parseFloat(text);
}

/**
 * Decode one optional field
 *
 * @throws {SamError} On a malformed tag name, type or value
 *
 * @example
 * ```typescript
 * parseTag("NM:i:2");       // { tag: "NM", type: "i", value: 2 }
 * parseTag("XA:Z:chr1,+5"); // { tag: "XA", type: "Z", value: "chr1,+5" }
 * ```
 */
export function parseTag(field: string): SamTag {
  const first = field.indexOf(":");
  const second = field.indexOf(":", first + 1);
  if (first === -1 || second === -1) {
    throw new SamError(
      `Invalid tag format: ${field} (expected TAG:TYPE:VALUE)`,
      undefined,
      "tag"
    );
  }

  const tag = field.slice(0, first);
  const type = field.slice(first + 1, second);
  const value = field.slice(second + 1);

  if (!TAG_PATTERN.test(tag)) {
    throw new SamError(`SAM tag must be 2 alphanumeric characters: ${tag}`, undefined, "tag");
  }

  switch (type) {
    case "A":
      if (value.length !== 1) {
        throw new SamError(`Tag ${tag} of type A must hold one character`, undefined, "tag");
      }
      return { tag, type, value };
    case "Z":
    case "H":
      return { tag, type, value };
    case "i":
      return { tag, type, value: parseNumber(value, true, field) };
    case "f":
      return { tag, type, value: parseNumber(value, false, field) };
    case "B": {
      const [subtype = "", ...elements] = value.split(",");
      if (subtype.length !== 1 || !ARRAY_SUBTYPES.includes(subtype)) {
        throw new SamError(`Invalid array subtype '${subtype}' in ${field}`, undefined, "tag");
      }
      const integer = subtype !== "f";
      return {
        tag,
        type,
        subtype,
        value: elements.map((element) => parseNumber(element, integer, field)),
      };
    }
    default:
      throw new SamError(`Unsupported tag type '${type}' in ${field}`, undefined, "tag");
  }
}
