/**
 * VCF document writer
 */

import { TextRecordWriter } from "../record/writer";
import type { VcfHeader } from "./header";
import type { VcfRecord } from "./record";

class VCFWriter extends TextRecordWriter<VcfRecord, VcfHeader> {
  constructor() {
    super("VCF");
  }
}

export { VCFWriter };
