/**
 * Emitter types
 */

import type { Diagnostic, InputFile } from "@binembed/frontend";

/**
 * Literal dialects for embedded data:
 * - "string": concatenated, escaped string literals (denser, readable)
 * - "bytes": comma-separated `0xHH` constants in an array initializer
 */
export type LiteralStyle = "string" | "bytes";

export type EncoderOptions = {
  readonly style: LiteralStyle;
  /** Wrap string segments once their escaped width reaches this column */
  readonly lineWidth: number;
  /** Constants per row in the byte-array dialect */
  readonly rowSize: number;
};

export type EncodedLiteral = {
  readonly decodedLength: number;
  readonly literalText: string;
};

/**
 * Streaming literal encoder. Lines are handed to the writer as soon as
 * they are complete.
 */
export type LiteralEncoder = {
  readonly push: (chunk: Uint8Array) => void;
  /** Flush the open line and return the number of bytes consumed */
  readonly finish: () => number;
};

export type DuplicateNamePolicy = "overwrite" | "error";

export type RegistryEntry = {
  readonly index: number;
  readonly displayName: string;
  readonly identifier: string;
  readonly file: InputFile;
};

export type Registry = {
  readonly entries: readonly RegistryEntry[];
  readonly count: number;
  /** Name lookup view; for duplicate names the later entry wins */
  readonly byName: ReadonlyMap<string, RegistryEntry>;
};

export type AssembledRegistry = {
  readonly registry: Registry;
  readonly diagnostics: readonly Diagnostic[];
};

export type EmitterOptions = {
  /** Optional C++ namespace, `a` or `a::b` */
  readonly namespace?: string;
  /** File name of the declaration document, as included by the definition */
  readonly headerFileName: string;
  readonly encoder: EncoderOptions;
  /** Spaces per indentation level in generated function bodies */
  readonly indent?: number;
};

/**
 * Destination of a generated document
 */
export type TextSink = {
  readonly write: (text: string) => void;
};
