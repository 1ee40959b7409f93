/**
 * Byte-array dialect: `0xHH,` constants in rows of a fixed size
 */

import type { LiteralEncoder } from "../types.js";
import { toHex2 } from "./escape.js";

export const createByteArrayEncoder = (
  rowSize: number,
  writeLine: (line: string) => void
): LiteralEncoder => {
  let row: string[] = [];
  let consumed = 0;

  const flush = (): void => {
    writeLine(row.join(" "));
    row = [];
  };

  return {
    push: (chunk) => {
      for (const byte of chunk) {
        row.push(`0x${toHex2(byte)},`);
        if (row.length >= rowSize) {
          flush();
        }
      }
      consumed += chunk.length;
    },
    finish: () => {
      if (row.length > 0) {
        flush();
      }
      return consumed;
    },
  };
};
