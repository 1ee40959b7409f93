/**
 * Input file model
 *
 * An InputFile pairs a discovered path with the name it is embedded under,
 * the identifier used in generated code and the source its bytes come from.
 * Bytes are not held here; they are pulled from the source once, when the
 * definition document is written.
 */

import { basename } from "node:path";
import type { Diagnostic } from "./types/diagnostic.js";
import { type Result, ok } from "./types/result.js";
import { deriveIdentifier } from "./identifiers.js";

/**
 * Streams a file's bytes to `onChunk` in order and returns the total count.
 * Chunks may be views over a reused buffer: copy them to keep them.
 */
export type ByteSource = (
  onChunk: (chunk: Uint8Array) => void
) => Result<number, Diagnostic>;

export type InputFile = {
  readonly path: string;
  readonly displayName: string;
  readonly identifier: string;
  readonly source: ByteSource;
};

export const createInputFile = (
  path: string,
  source: ByteSource,
  displayName: string = basename(path)
): InputFile => ({
  path,
  displayName,
  identifier: deriveIdentifier(displayName),
  source,
});

/**
 * Byte source over bytes already in memory
 */
export const memoryByteSource =
  (bytes: Uint8Array): ByteSource =>
  (onChunk) => {
    if (bytes.length > 0) {
      onChunk(bytes);
    }
    return ok(bytes.length);
  };

/**
 * Drain a byte source into a single buffer
 */
export const readAll = (source: ByteSource): Result<Uint8Array, Diagnostic> => {
  const chunks: Uint8Array[] = [];
  const result = source((chunk) => {
    chunks.push(chunk.slice());
  });
  if (!result.ok) return result;

  const bytes = new Uint8Array(result.value);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.length;
  }
  return ok(bytes);
};
