/**
 * File reading utilities
 *
 * Every file-system call runs as an Effect program whose failures are typed
 * as FileError; the exported functions run those programs to promises so
 * callers see ordinary async functions.
 */

import type { FileHandle } from "node:fs/promises";
import { open, readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError, StreamError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

type ResolvedReaderOptions = Required<Omit<FileReaderOptions, "signal">> &
  Pick<FileReaderOptions, "signal">;

const DEFAULT_OPTIONS: ResolvedReaderOptions = {
  bufferSize: 65_536,
  encoding: "utf8",
  maxFileSize: 1_073_741_824, // 1GB
};

/**
 * Run a file program, rethrowing its typed failure as-is
 */
export async function runFileProgram<A>(program: Effect.Effect<A, FileError>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

const statFile = (path: FilePath) =>
  Effect.tryPromise({
    try: () => stat(path),
    catch: (error) => FileError.fromSystemError("stat", path, error),
  });

/**
 * Check if a regular file exists at `path`
 *
 * @throws {FileError} If the path itself is invalid
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = statFile(validatedPath).pipe(
    Effect.map((info) => info.isFile()),
    Effect.orElseSucceed(() => false)
  );

  return runFileProgram(program);
}

/**
 * Get file metadata
 *
 * @throws {FileError} If the file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const info = yield* statFile(validatedPath);
    if (!info.isFile()) {
      return yield* Effect.fail(new FileError("Path is not a regular file", validatedPath, "stat"));
    }
    return {
      path: validatedPath,
      size: info.size,
      lastModified: info.mtime,
      extension: extname(validatedPath),
    };
  });

  return runFileProgram(program);
}

/**
 * Create a streaming reader for a file
 *
 * The file handle is closed when the stream ends, is cancelled, or fails.
 *
 * @throws {FileError} If the file cannot be opened or exceeds `maxFileSize`
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    yield* checkSize(validatedPath, mergedOptions);
    const handle = yield* Effect.tryPromise({
      try: () => open(validatedPath, "r"),
      catch: (error) => FileError.fromSystemError("open", validatedPath, error),
    });
    return streamFromHandle(handle, mergedOptions);
  });

  return runFileProgram(program);
}

/**
 * Read an entire file into a string
 *
 * @throws {FileError} If the file cannot be read or exceeds `maxFileSize`
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    yield* checkSize(validatedPath, mergedOptions);
    return yield* Effect.tryPromise({
      try: () =>
        readFile(validatedPath, {
          encoding: mergedOptions.encoding,
          ...(mergedOptions.signal !== undefined && { signal: mergedOptions.signal }),
        }),
      catch: (error) => FileError.fromSystemError("read", validatedPath, error),
    });
  });

  return runFileProgram(program);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function checkSize(path: FilePath, options: ResolvedReaderOptions) {
  return Effect.gen(function* () {
    const info = yield* statFile(path);
    if (info.size > options.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${info.size} bytes exceeds limit of ${options.maxFileSize} bytes`,
          path,
          "read"
        )
      );
    }
    return info.size;
  });
}

function streamFromHandle(
  handle: FileHandle,
  options: ResolvedReaderOptions
): ReadableStream<Uint8Array> {
  let bytesRead = 0;
  let cancelled = false;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      if (options.signal?.aborted === true) {
        await handle.close();
        controller.error(new StreamError("File read was aborted", "read", bytesRead));
        return;
      }

      const buffer = new Uint8Array(options.bufferSize);
      const result = await handle
        .read(buffer, 0, buffer.length, null)
        .catch(async (error: unknown) => {
          await handle.close();
          throw new StreamError(
            `File read failed: ${error instanceof Error ? error.message : String(error)}`,
            "read",
            bytesRead
          );
        });

      if (cancelled) {
        return;
      }
      if (result.bytesRead === 0) {
        await handle.close();
        controller.close();
        return;
      }
      bytesRead += result.bytesRead;
      controller.enqueue(buffer.subarray(0, result.bytesRead));
    },
    async cancel() {
      cancelled = true;
      await handle.close();
    },
  });
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): ResolvedReaderOptions {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }
  return { ...DEFAULT_OPTIONS, ...options };
}

export { validatePath };
