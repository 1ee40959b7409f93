/**
 * Generated-document reader
 *
 * Parses a definition document produced by this emitter back into the
 * name-indexed table the generated C++ builds at run time. Used by
 * `binembed inspect` and by the tests to check generated output end to end.
 */

import {
  createDiagnostic,
  type Diagnostic,
  type Result,
  ok,
  error,
  flatMap,
} from "@binembed/frontend";
import { decodeLiteral } from "./decoder.js";
import type { LiteralStyle } from "./types.js";

export type EmbeddedFile = {
  readonly name: string;
  readonly identifier: string;
  readonly size: number;
  readonly content: Uint8Array;
};

export type EmbeddedFileTable = {
  readonly count: number;
  /** Files in registration order */
  readonly files: readonly EmbeddedFile[];
  /** Built once from `files`; later files replace earlier ones of the same name */
  readonly contents: ReadonlyMap<string, Uint8Array>;
};

type RawData = { readonly style: LiteralStyle; readonly body: string };

const NAME_PATTERN = /^const char name_(\w+)\[\] = (".*");$/gm;
const SIZE_PATTERN = /^const std::size_t size_(\w+) = (\d+);$/gm;
const STRING_DATA_PATTERN = /^const char data_(\w+)\[\] =\n([\s\S]*?);$/gm;
const BYTES_DATA_PATTERN = /^const unsigned char data_(\w+)\[1?\] = \{([\s\S]*?)\};$/gm;
const REGISTRATION_PATTERN = /^\s*result\[name_(\w+)\] = get_(\w+)\(\);$/gm;
const COUNT_PATTERN = /constexpr std::size_t embeddedFileCount = (\d+);/;

const malformed = (message: string): Diagnostic =>
  createDiagnostic("EMB4002", "error", message);

const collect = <T>(
  text: string,
  pattern: RegExp,
  toValue: (match: RegExpMatchArray) => T
): Map<string, T> => {
  const values = new Map<string, T>();
  for (const match of text.matchAll(pattern)) {
    const id = match[1];
    if (id !== undefined) {
      values.set(id, toValue(match));
    }
  }
  return values;
};

const readFile = (
  identifier: string,
  names: ReadonlyMap<string, string>,
  sizes: ReadonlyMap<string, number>,
  data: ReadonlyMap<string, RawData>
): Result<EmbeddedFile, Diagnostic> => {
  const nameLiteral = names.get(identifier);
  const size = sizes.get(identifier);
  const raw = data.get(identifier);
  if (nameLiteral === undefined || size === undefined || raw === undefined) {
    return error(malformed(`Incomplete definitions for '${identifier}'`));
  }

  return flatMap(decodeLiteral(nameLiteral, "string"), (nameBytes) =>
    flatMap(decodeLiteral(raw.body, raw.style), (content) =>
      content.length === size
        ? ok<EmbeddedFile, Diagnostic>({
            name: new TextDecoder().decode(nameBytes),
            identifier,
            size,
            content,
          })
        : error<EmbeddedFile, Diagnostic>(
            malformed(
              `Data for '${identifier}' decodes to ${content.length} bytes but its size is ${size}`
            )
          )
    )
  );
};

export const readDefinitionDocument = (
  text: string
): Result<EmbeddedFileTable, Diagnostic> => {
  const names = collect(text, NAME_PATTERN, (m) => m[2] ?? "");
  const sizes = collect(text, SIZE_PATTERN, (m) => Number(m[2]));
  const data = new Map<string, RawData>([
    ...collect(text, STRING_DATA_PATTERN, (m): RawData => ({ style: "string", body: m[2] ?? "" })),
    ...collect(text, BYTES_DATA_PATTERN, (m): RawData => ({ style: "bytes", body: m[2] ?? "" })),
  ]);

  if (!/buildEmbeddedFileMap\(\) \{$/m.test(text)) {
    return error(malformed("No buildEmbeddedFileMap() definition found"));
  }

  const files: EmbeddedFile[] = [];
  for (const match of text.matchAll(REGISTRATION_PATTERN)) {
    const [, nameId, getterId] = match;
    if (nameId === undefined || nameId !== getterId) {
      return error(malformed(`Mismatched registration: ${match[0].trim()}`));
    }
    const file = readFile(nameId, names, sizes, data);
    if (!file.ok) return file;
    files.push(file.value);
  }

  const contents = new Map<string, Uint8Array>();
  for (const file of files) {
    contents.set(file.name, file.content);
  }

  return ok({ count: files.length, files, contents });
};

/**
 * Content of an embedded file; a missing name is an error, never empty content
 */
export const mustGetFile = (
  table: EmbeddedFileTable,
  name: string
): Result<Uint8Array, Diagnostic> => {
  const content = table.contents.get(name);
  return content !== undefined
    ? ok(content)
    : error(
        createDiagnostic("EMB4001", "error", `Embedded file not found: ${name}`)
      );
};

/**
 * Value of `embeddedFileCount` in a declaration document
 */
export const readDeclarationCount = (
  text: string
): Result<number, Diagnostic> => {
  const match = COUNT_PATTERN.exec(text);
  return match?.[1] !== undefined
    ? ok(Number(match[1]))
    : error(malformed("No embeddedFileCount declaration found"));
};
