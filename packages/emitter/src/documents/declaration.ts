/**
 * Declaration document (.h)
 *
 * Declares the registry's public surface: the file count, one accessor per
 * file, the name-indexed map and the throwing lookup.
 */

import {
  type Diagnostic,
  type Result,
  ok,
  makeGuardToken,
  validateNamespace,
} from "@binembed/frontend";
import type { EmitterOptions, Registry } from "../types.js";
import { quoteCppString } from "../encoder/index.js";
import {
  MAP_TYPE,
  WARNING_BANNER,
  closeNamespaces,
  getIndent,
  openNamespaces,
} from "./common.js";

const emitNotFoundClass = (options: EmitterOptions): string => {
  const i1 = getIndent(options, 1);
  const i2 = getIndent(options, 2);
  return [
    "// thrown by mustGetFile() when no embedded file has the requested name",
    "class EmbeddedFileNotFound : public std::runtime_error {",
    "public:",
    `${i1}explicit EmbeddedFileNotFound(const std::string & fileName)`,
    `${i2}: std::runtime_error("embedded file not found: " + fileName), m_fileName(fileName) {}`,
    "",
    `${i1}const std::string & fileName() const { return m_fileName; }`,
    "",
    "private:",
    `${i1}std::string m_fileName;`,
    "};",
    "",
  ].join("\n");
};

export const emitDeclarationDocument = (
  registry: Registry,
  options: EmitterOptions
): Result<string, Diagnostic> => {
  const namespaces = options.namespace
    ? validateNamespace(options.namespace)
    : ok<readonly string[], Diagnostic>([]);
  if (!namespaces.ok) return namespaces;

  const guard = makeGuardToken(options.namespace);
  const parts: string[] = [];

  parts.push(WARNING_BANNER);
  parts.push(`#ifndef ${guard}\n`);
  parts.push(`#define ${guard}\n`);
  parts.push("\n");
  parts.push("#include <cstddef>\n");
  parts.push("#include <map>\n");
  parts.push("#include <stdexcept>\n");
  parts.push("#include <string>\n");
  parts.push("\n");

  if (namespaces.value.length > 0) {
    parts.push(openNamespaces(namespaces.value));
    parts.push("\n");
  }

  parts.push(emitNotFoundClass(options));
  parts.push("\n");
  parts.push("// total number of embedded files\n");
  parts.push(
    `constexpr std::size_t embeddedFileCount = ${registry.count};\n`
  );

  for (const entry of registry.entries) {
    parts.push("\n");
    parts.push(`// file ${quoteCppString(entry.displayName)}\n`);
    parts.push(`const std::string & get_${entry.identifier}();\n`);
  }

  parts.push("\n");
  parts.push("// returns all the embedded files indexed by their name\n");
  parts.push(`const ${MAP_TYPE} & allEmbeddedFiles();\n`);
  parts.push("\n");
  parts.push(
    "// returns the content of an embedded file (throws EmbeddedFileNotFound if not found)\n"
  );
  parts.push("const std::string & mustGetFile(const std::string & fileName);\n");

  if (namespaces.value.length > 0) {
    parts.push("\n");
    parts.push(closeNamespaces(namespaces.value));
  }

  parts.push("\n");
  parts.push(`#endif // ${guard}\n`);

  return ok(parts.join(""));
};
