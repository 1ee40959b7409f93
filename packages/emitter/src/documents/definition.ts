/**
 * Definition document (.cpp)
 *
 * Holds each file's name, data and size, the routine that fills the
 * name-indexed map, and the public accessor bodies. File contents are read
 * from their sources here, once, and streamed through the encoder straight
 * into the sink.
 */

import {
  type Diagnostic,
  type Result,
  ok,
  validateNamespace,
} from "@binembed/frontend";
import type {
  EmitterOptions,
  Registry,
  RegistryEntry,
  TextSink,
} from "../types.js";
import { createLiteralEncoder, quoteCppString } from "../encoder/index.js";
import {
  MAP_TYPE,
  WARNING_BANNER,
  closeNamespaces,
  getIndent,
  openNamespaces,
} from "./common.js";

export type EmittedFile = {
  readonly displayName: string;
  readonly identifier: string;
  readonly size: number;
};

export type DefinitionHooks = {
  /** Called before a file's content is read */
  readonly onFileStart?: (entry: RegistryEntry) => void;
  /** Called once a file's content has been written */
  readonly onFileDone?: (file: EmittedFile) => void;
};

const emitFileData = (
  entry: RegistryEntry,
  options: EmitterOptions,
  sink: TextSink
): Result<number, Diagnostic> => {
  const id = entry.identifier;
  const bytesStyle = options.encoder.style === "bytes";
  const rowIndent = getIndent(options, 1);
  let lines = 0;

  sink.write(`// file ${quoteCppString(entry.displayName)}\n`);
  sink.write(`const char name_${id}[] = ${quoteCppString(entry.displayName)};\n`);

  if (!bytesStyle) {
    sink.write(`const char data_${id}[] =\n`);
  }

  const encoder = createLiteralEncoder(options.encoder, (line) => {
    if (bytesStyle && lines === 0) {
      sink.write(`const unsigned char data_${id}[] = {\n`);
    }
    sink.write(bytesStyle ? `${rowIndent}${line}\n` : `${line}\n`);
    lines++;
  });

  const read = entry.file.source((chunk) => encoder.push(chunk));
  if (!read.ok) return read;
  const size = encoder.finish();

  if (bytesStyle) {
    sink.write(
      lines === 0 ? `const unsigned char data_${id}[1] = {};\n` : "};\n"
    );
  } else {
    sink.write(lines === 0 ? '"";\n' : ";\n");
  }
  sink.write(`const std::size_t size_${id} = ${size};\n`);
  sink.write("\n");

  return ok(size);
};

const emitMapBuilder = (registry: Registry, options: EmitterOptions): string => {
  const i1 = getIndent(options, 1);
  const lines = [`${MAP_TYPE} buildEmbeddedFileMap() {`, `${i1}${MAP_TYPE} result;`];
  for (const entry of registry.entries) {
    lines.push(`${i1}result[name_${entry.identifier}] = get_${entry.identifier}();`);
  }
  lines.push(`${i1}return result;`, "}", "");
  return lines.join("\n");
};

const emitAccessor = (entry: RegistryEntry, options: EmitterOptions): string => {
  const i1 = getIndent(options, 1);
  const id = entry.identifier;
  const data =
    options.encoder.style === "bytes"
      ? `reinterpret_cast<const char *>(data_${id})`
      : `data_${id}`;
  return [
    `const std::string & get_${id}() {`,
    `${i1}static const std::string s_data(${data}, size_${id});`,
    `${i1}return s_data;`,
    "}",
    "",
  ].join("\n");
};

const emitLookups = (options: EmitterOptions): string => {
  const i1 = getIndent(options, 1);
  const i2 = getIndent(options, 2);
  return [
    `const ${MAP_TYPE} & allEmbeddedFiles() {`,
    `${i1}static const ${MAP_TYPE} s_map = buildEmbeddedFileMap();`,
    `${i1}return s_map;`,
    "}",
    "",
    "const std::string & mustGetFile(const std::string & fileName) {",
    `${i1}const auto & files = allEmbeddedFiles();`,
    `${i1}const auto it = files.find(fileName);`,
    `${i1}if (it != files.end()) {`,
    `${i2}return it->second;`,
    `${i1}}`,
    `${i1}throw EmbeddedFileNotFound(fileName);`,
    "}",
    "",
  ].join("\n");
};

export const emitDefinitionDocument = (
  registry: Registry,
  options: EmitterOptions,
  sink: TextSink,
  hooks: DefinitionHooks = {}
): Result<readonly EmittedFile[], Diagnostic> => {
  const namespaces = options.namespace
    ? validateNamespace(options.namespace)
    : ok<readonly string[], Diagnostic>([]);
  if (!namespaces.ok) return namespaces;

  sink.write(WARNING_BANNER);
  sink.write(`#include "${options.headerFileName}"\n`);
  sink.write("\n");

  if (namespaces.value.length > 0) {
    sink.write(openNamespaces(namespaces.value));
    sink.write("\n");
  }

  sink.write("namespace {\n");
  sink.write("\n");

  const emitted: EmittedFile[] = [];
  for (const entry of registry.entries) {
    hooks.onFileStart?.(entry);
    const size = emitFileData(entry, options, sink);
    if (!size.ok) return size;

    const file: EmittedFile = {
      displayName: entry.displayName,
      identifier: entry.identifier,
      size: size.value,
    };
    emitted.push(file);
    hooks.onFileDone?.(file);
  }

  sink.write(emitMapBuilder(registry, options));
  sink.write("\n");
  sink.write("} // namespace\n");

  for (const entry of registry.entries) {
    sink.write("\n");
    sink.write(emitAccessor(entry, options));
  }

  sink.write("\n");
  sink.write(emitLookups(options));

  if (namespaces.value.length > 0) {
    sink.write("\n");
    sink.write(closeNamespaces(namespaces.value));
  }

  return ok(emitted);
};
