/**
 * In-memory text sink
 */

import type { TextSink } from "./types.js";

export type StringSink = TextSink & {
  readonly text: () => string;
};

export const createStringSink = (): StringSink => {
  const parts: string[] = [];
  return {
    write: (text) => {
      parts.push(text);
    },
    text: () => parts.join(""),
  };
};
