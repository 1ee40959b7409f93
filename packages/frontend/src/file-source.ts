/**
 * Byte source backed by a file on disk
 */

import { openSync, readSync, closeSync } from "node:fs";
import {
  createDiagnostic,
  describeError,
  type Diagnostic,
} from "./types/diagnostic.js";
import { type Result, ok, error } from "./types/result.js";
import type { ByteSource } from "./input-file.js";

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

const readFailure = (path: string, message: string): Diagnostic =>
  createDiagnostic("EMB1002", "error", message, path);

/**
 * Read a file in one scoped acquisition: open, read until EOF, close.
 * The descriptor is closed on every path, including read errors and
 * exceptions thrown by `onChunk`.
 */
export const fileByteSource =
  (path: string, chunkSize: number = DEFAULT_CHUNK_SIZE): ByteSource =>
  (onChunk) => {
    let fd: number;
    try {
      fd = openSync(path, "r");
    } catch (err) {
      return error(
        readFailure(path, `Failed to open file: ${describeError(err)}`)
      );
    }

    try {
      const buffer = new Uint8Array(chunkSize);
      let total = 0;
      for (;;) {
        const read = readChunk(fd, buffer, path);
        if (!read.ok) return read;
        if (read.value === 0) break;
        onChunk(buffer.subarray(0, read.value));
        total += read.value;
      }
      return ok(total);
    } finally {
      closeSync(fd);
    }
  };

const readChunk = (
  fd: number,
  buffer: Uint8Array,
  path: string
): Result<number, Diagnostic> => {
  try {
    return ok(readSync(fd, buffer, 0, buffer.length, null));
  } catch (err) {
    return error(
      readFailure(path, `Failed to read file: ${describeError(err)}`)
    );
  }
};
