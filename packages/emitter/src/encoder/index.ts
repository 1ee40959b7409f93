/**
 * Byte-literal encoder - public API
 */

import {
  createDiagnostic,
  type Diagnostic,
  type Result,
  ok,
  error,
} from "@binembed/frontend";
import type {
  EncodedLiteral,
  EncoderOptions,
  LiteralEncoder,
  LiteralStyle,
} from "../types.js";
import { createStringLiteralEncoder } from "./string-literal.js";
import { createByteArrayEncoder } from "./byte-array.js";

export { escapeByte, toHex2, type EscapedByte, type EscapeKind } from "./escape.js";
export { quoteCppString } from "./string-literal.js";

export const DEFAULT_ENCODER_OPTIONS: EncoderOptions = {
  style: "string",
  lineWidth: 120,
  rowSize: 20,
};

export const MIN_LINE_WIDTH = 8;

export const isLiteralStyle = (value: unknown): value is LiteralStyle =>
  value === "string" || value === "bytes";

export const validateEncoderOptions = (
  options: EncoderOptions
): Result<EncoderOptions, Diagnostic> => {
  if (!isLiteralStyle(options.style)) {
    return error(
      createDiagnostic(
        "EMB2004",
        "error",
        `Unknown literal style '${String(options.style)}'`,
        undefined,
        "Use 'string' or 'bytes'"
      )
    );
  }
  if (!Number.isInteger(options.lineWidth) || options.lineWidth < MIN_LINE_WIDTH) {
    return error(
      createDiagnostic(
        "EMB2004",
        "error",
        `Line width must be an integer of at least ${MIN_LINE_WIDTH}, got ${options.lineWidth}`
      )
    );
  }
  if (!Number.isInteger(options.rowSize) || options.rowSize < 1) {
    return error(
      createDiagnostic(
        "EMB2004",
        "error",
        `Row size must be a positive integer, got ${options.rowSize}`
      )
    );
  }
  return ok(options);
};

/**
 * Create a streaming encoder for the configured dialect
 */
export const createLiteralEncoder = (
  options: EncoderOptions,
  writeLine: (line: string) => void
): LiteralEncoder =>
  options.style === "bytes"
    ? createByteArrayEncoder(options.rowSize, writeLine)
    : createStringLiteralEncoder(
        { lineWidth: options.lineWidth, breakOnNewline: true },
        writeLine
      );

/**
 * Encode bytes held in memory
 */
export const encodeBytes = (
  bytes: Uint8Array,
  options: EncoderOptions = DEFAULT_ENCODER_OPTIONS
): EncodedLiteral => {
  const lines: string[] = [];
  const encoder = createLiteralEncoder(options, (line) => lines.push(line));
  encoder.push(bytes);
  const decodedLength = encoder.finish();
  return { decodedLength, literalText: lines.join("\n") };
};
