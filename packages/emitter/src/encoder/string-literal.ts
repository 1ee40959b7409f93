/**
 * String-literal dialect
 *
 * Bytes become a sequence of adjacent C++ string literals, one per line:
 *
 *   "first line\n"
 *   "\x00\x01 binary data..."
 *
 * Two C++ rules need care beyond the escaping table:
 * - `\x` escapes are greedy, so a hex digit written right after one would
 *   be read as part of it. The literal is closed and reopened (`""`) first.
 * - `??` followed by certain characters is a trigraph before C++17, so a
 *   `?` that follows another `?` is written as `\?`.
 */

import type { LiteralEncoder } from "../types.js";
import { escapeByte, isHexDigit } from "./escape.js";

export type StringLiteralOptions = {
  readonly lineWidth: number;
  /** Start a new segment after every newline byte */
  readonly breakOnNewline: boolean;
};

export const createStringLiteralEncoder = (
  options: StringLiteralOptions,
  writeLine: (line: string) => void
): LiteralEncoder => {
  let segment = "";
  let column = 0;
  let open = false;
  let afterHexEscape = false;
  let consumed = 0;

  const close = (): void => {
    writeLine(`"${segment}"`);
    segment = "";
    column = 0;
    open = false;
    afterHexEscape = false;
  };

  const append = (text: string, width: number): void => {
    segment += text;
    column += width;
    open = true;
  };

  const pushByte = (byte: number): void => {
    const escaped = escapeByte(byte);

    if (escaped.kind === "printable") {
      if (afterHexEscape && isHexDigit(escaped.text)) {
        append('""', 2);
      }
      if (escaped.text === "?" && segment.endsWith("?")) {
        append("\\?", 2);
      } else {
        append(escaped.text, 1);
      }
    } else {
      append(escaped.text, escaped.width);
    }
    afterHexEscape = escaped.kind === "hex";

    if (escaped.kind === "newline" && options.breakOnNewline) {
      close();
    } else if (column >= options.lineWidth) {
      close();
    }
  };

  return {
    push: (chunk) => {
      for (const byte of chunk) {
        pushByte(byte);
      }
      consumed += chunk.length;
    },
    finish: () => {
      if (open) {
        close();
      }
      return consumed;
    },
  };
};

/**
 * Quote a short string (such as a file name) as a single C++ literal.
 * The text is encoded as UTF-8; non-ASCII bytes become hex escapes.
 */
export const quoteCppString = (text: string): string => {
  const lines: string[] = [];
  const encoder = createStringLiteralEncoder(
    { lineWidth: Number.POSITIVE_INFINITY, breakOnNewline: false },
    (line) => lines.push(line)
  );
  encoder.push(new TextEncoder().encode(text));
  encoder.finish();
  return lines[0] ?? '""';
};
