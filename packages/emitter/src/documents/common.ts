/**
 * Shared pieces of the generated documents
 */

import type { EmitterOptions } from "../types.js";

export const WARNING_BANNER =
  "// This file was generated by binembed\n" +
  "// WARNING: any change you make will be lost!\n";

export const MAP_TYPE = "std::map<std::string, std::string>";

/**
 * Indentation string for a nesting level
 */
export const getIndent = (options: EmitterOptions, level: number): string =>
  " ".repeat((options.indent ?? 4) * level);

export const openNamespaces = (segments: readonly string[]): string =>
  segments.map((segment) => `namespace ${segment} {\n`).join("");

export const closeNamespaces = (segments: readonly string[]): string =>
  [...segments]
    .reverse()
    .map((segment) => `} // namespace ${segment}\n`)
    .join("");
