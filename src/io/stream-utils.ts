/**
 * Line-oriented reading of byte streams
 *
 * Decodes a `ReadableStream<Uint8Array>` incrementally and yields complete
 * lines without their terminators. Both `\n` and `\r\n` endings are handled,
 * including a `\r\n` pair split across two chunks.
 */

import { StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

/**
 * Read a stream line by line
 *
 * A final line without a terminator is yielded as well, unless it is empty.
 * When iteration stops before the end of the stream, the stream is cancelled.
 *
 * @throws {StreamError} When the underlying stream fails
 *
 * @example
 * ```typescript
 * const stream = await createStream("alignments.sam");
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "latin1" = "utf8"
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "latin1" ? "latin1" : "utf-8");
  let buffer = "";
  let bytesProcessed = 0;
  let exhausted = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        exhausted = true;
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          bytesProcessed
        );
      });
      if (chunk.done) {
        exhausted = true;
        break;
      }

      bytesProcessed += chunk.value.length;
      const result = processBuffer(buffer + decoder.decode(chunk.value, { stream: true }));
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    yield* result.lines;
    const last = stripCarriageReturn(result.remainder);
    if (last !== "") {
      yield last;
    }
  } finally {
    // Stopped before the end of the stream
    if (!exhausted) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Split buffered text into complete lines and the unterminated remainder
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const parts = buffer.split("\n");
  const remainder = parts.pop() ?? "";
  return {
    lines: parts.map(stripCarriageReturn),
    remainder,
  };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
