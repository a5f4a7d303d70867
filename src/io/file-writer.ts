/**
 * File writing operations
 *
 * Same shape as the reader: Effect programs with FileError failures, exposed
 * as Promise-based functions.
 *
 * @module file-writer
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { FilePath } from "../types";
import { runFileProgram, validatePath } from "./file-reader";

const ensureParentDirectory = (path: FilePath) =>
  Effect.tryPromise({
    try: () => mkdir(dirname(path), { recursive: true }),
    catch: (error) => FileError.fromSystemError("write", path, error),
  });

/**
 * Write a string to a file, replacing any existing content
 *
 * Missing parent directories are created.
 *
 * @throws {FileError} When the path is invalid or the write fails
 *
 * @example
 * ```typescript
 * await writeString("out/calls.vcf", vcfText);
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    yield* ensureParentDirectory(validatedPath);
    yield* Effect.tryPromise({
      try: () => writeFile(validatedPath, content, "utf8"),
      catch: (error) => FileError.fromSystemError("write", validatedPath, error),
    });
  });

  await runFileProgram(program);
}

/**
 * Append a string to a file, creating it if needed
 *
 * @throws {FileError} When the path is invalid or the write fails
 */
export async function appendString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    yield* ensureParentDirectory(validatedPath);
    yield* Effect.tryPromise({
      try: () => appendFile(validatedPath, content, "utf8"),
      catch: (error) => FileError.fromSystemError("write", validatedPath, error),
    });
  });

  await runFileProgram(program);
}
