/**
 * SAM document writer
 */

import { TextRecordWriter } from "../record/writer";
import type { SamHeader } from "./header";
import type { SamRecord } from "./record";

/**
 * Writes SAM header lines and alignment lines
 *
 * @example
 * ```typescript
 * const writer = new SAMWriter();
 * await writer.writeFile("out.sam", header, records);
 * ```
 */
class SAMWriter extends TextRecordWriter<SamRecord, SamHeader> {
  constructor() {
    super("SAM");
  }
}

export { SAMWriter };
