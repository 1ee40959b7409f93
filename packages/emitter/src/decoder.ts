/**
 * Literal decoder
 *
 * Reads encoder output back into bytes with the same rules a C++ compiler
 * applies: adjacent string literals concatenate and `\x` escapes take every
 * hex digit that follows them.
 */

import {
  createDiagnostic,
  type Diagnostic,
  type Result,
  ok,
  error,
} from "@binembed/frontend";
import type { LiteralStyle } from "./types.js";

const SIMPLE_ESCAPES: Readonly<Record<string, number>> = {
  '"': 0x22,
  "'": 0x27,
  "?": 0x3f,
  "\\": 0x5c,
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
};

const malformed = (message: string): Diagnostic =>
  createDiagnostic("EMB4002", "error", message);

const isWhitespace = (c: string): boolean =>
  c === " " || c === "\n" || c === "\r" || c === "\t";

const isHex = (c: string): boolean => /^[0-9a-fA-F]$/.test(c);

const decodeStringLiterals = (text: string): Result<Uint8Array, Diagnostic> => {
  const bytes: number[] = [];
  let i = 0;

  while (i < text.length) {
    const c = text.charAt(i);
    if (isWhitespace(c)) {
      i++;
      continue;
    }
    if (c !== '"') {
      return error(malformed(`Expected '"' at offset ${i}, found '${c}'`));
    }
    i++;

    for (;;) {
      if (i >= text.length) {
        return error(malformed("Unterminated string literal"));
      }
      const ch = text.charAt(i);
      if (ch === '"') {
        i++;
        break;
      }
      if (ch !== "\\") {
        const code = ch.charCodeAt(0);
        if (code < 0x20 || code > 0x7e) {
          return error(
            malformed(`Unexpected character code ${code} at offset ${i}`)
          );
        }
        bytes.push(code);
        i++;
        continue;
      }

      const next = text.charAt(i + 1);
      if (next === "x") {
        let j = i + 2;
        while (j < text.length && isHex(text.charAt(j))) j++;
        const digits = text.slice(i + 2, j);
        if (digits.length === 0) {
          return error(malformed(`Hex escape without digits at offset ${i}`));
        }
        const value = parseInt(digits, 16);
        if (value > 0xff) {
          return error(
            malformed(`Hex escape \\x${digits} out of range at offset ${i}`)
          );
        }
        bytes.push(value);
        i = j;
        continue;
      }

      const simple = SIMPLE_ESCAPES[next];
      if (simple === undefined) {
        return error(malformed(`Unknown escape '\\${next}' at offset ${i}`));
      }
      bytes.push(simple);
      i += 2;
    }
  }

  return ok(Uint8Array.from(bytes));
};

const decodeByteArray = (text: string): Result<Uint8Array, Diagnostic> => {
  const tokens = text.split(/[\s,]+/).filter((t) => t.length > 0);
  const bytes = new Uint8Array(tokens.length);

  for (const [index, token] of tokens.entries()) {
    if (!/^0x[0-9a-fA-F]{1,2}$/.test(token)) {
      return error(malformed(`Invalid byte constant '${token}'`));
    }
    bytes[index] = parseInt(token.slice(2), 16);
  }

  return ok(bytes);
};

export const decodeLiteral = (
  text: string,
  style: LiteralStyle
): Result<Uint8Array, Diagnostic> =>
  style === "bytes" ? decodeByteArray(text) : decodeStringLiterals(text);
