/**
 * Shared contracts for typed record lines
 */

import type { Header } from "./header";

/**
 * A record that may point back at the header of its document
 *
 * The reference is non-owning and is assigned by the parser that assembled
 * the document; records never set it themselves.
 */
export interface HeaderableRecord<H extends Header> {
  header?: H | undefined;
  toString(): string;
}

/**
 * Header plus records of one parsed document
 */
export interface TextDocument<R, H extends Header> {
  readonly header: H;
  readonly records: R[];
}

/**
 * Genomic position ordering: name lexicographically, then position numerically
 */
export function comparePositions(
  leftName: string,
  leftPos: number,
  rightName: string,
  rightPos: number
): number {
  if (leftName < rightName) return -1;
  if (leftName > rightName) return 1;
  return leftPos - rightPos;
}
