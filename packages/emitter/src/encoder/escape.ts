/**
 * Escaping table for C++ string literals
 *
 * Every byte value maps to exactly one case. Checked in order.
 */

export type EscapeKind =
  | "quote"
  | "newline"
  | "carriage-return"
  | "tab"
  | "backslash"
  | "printable"
  | "hex";

export type EscapedByte = {
  readonly kind: EscapeKind;
  readonly text: string;
  /** Characters the escape occupies in the generated literal */
  readonly width: 1 | 2 | 4;
};

export const toHex2 = (byte: number): string =>
  byte.toString(16).padStart(2, "0");

const build = (byte: number): EscapedByte => {
  if (byte === 0x22) return { kind: "quote", text: '\\"', width: 2 };
  if (byte === 0x0a) return { kind: "newline", text: "\\n", width: 2 };
  if (byte === 0x0d) return { kind: "carriage-return", text: "\\r", width: 2 };
  if (byte === 0x09) return { kind: "tab", text: "\\t", width: 2 };
  if (byte === 0x5c) return { kind: "backslash", text: "\\\\", width: 2 };
  if (byte >= 0x20 && byte <= 0x7e) {
    return { kind: "printable", text: String.fromCharCode(byte), width: 1 };
  }
  return { kind: "hex", text: `\\x${toHex2(byte)}`, width: 4 };
};

const TABLE: readonly EscapedByte[] = Array.from({ length: 256 }, (_, b) =>
  build(b)
);

export const escapeByte = (byte: number): EscapedByte => {
  const escaped = TABLE[byte & 0xff];
  if (!escaped) {
    throw new RangeError(`Not a byte value: ${byte}`);
  }
  return escaped;
};

export const isHexDigit = (c: string): boolean => /^[0-9a-fA-F]$/.test(c);
