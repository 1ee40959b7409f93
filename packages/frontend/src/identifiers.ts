/**
 * C++ identifier utilities
 *
 * Embedded files are addressed from generated code through identifiers
 * derived from their file names. Namespaces given on the command line are
 * checked against the same rules, and against the C++ keyword list.
 */

import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { type Result, ok, error } from "./types/result.js";

export const IDENTIFIER_PREFIX = "file_";

/**
 * C++ keywords and alternative operator tokens (as of C++23)
 * https://en.cppreference.com/w/cpp/keyword
 */
const CPP_KEYWORDS: ReadonlySet<string> = new Set([
  "alignas",
  "alignof",
  "and",
  "and_eq",
  "asm",
  "auto",
  "bitand",
  "bitor",
  "bool",
  "break",
  "case",
  "catch",
  "char",
  "char8_t",
  "char16_t",
  "char32_t",
  "class",
  "compl",
  "concept",
  "const",
  "consteval",
  "constexpr",
  "constinit",
  "const_cast",
  "continue",
  "co_await",
  "co_return",
  "co_yield",
  "decltype",
  "default",
  "delete",
  "do",
  "double",
  "dynamic_cast",
  "else",
  "enum",
  "explicit",
  "export",
  "extern",
  "false",
  "float",
  "for",
  "friend",
  "goto",
  "if",
  "inline",
  "int",
  "long",
  "mutable",
  "namespace",
  "new",
  "noexcept",
  "not",
  "not_eq",
  "nullptr",
  "operator",
  "or",
  "or_eq",
  "private",
  "protected",
  "public",
  "register",
  "reinterpret_cast",
  "requires",
  "return",
  "short",
  "signed",
  "sizeof",
  "static",
  "static_assert",
  "static_cast",
  "struct",
  "switch",
  "template",
  "this",
  "thread_local",
  "throw",
  "true",
  "try",
  "typedef",
  "typeid",
  "typename",
  "union",
  "unsigned",
  "using",
  "virtual",
  "void",
  "volatile",
  "wchar_t",
  "while",
  "xor",
  "xor_eq",
]);

const isAsciiAlphanumeric = (byte: number): boolean =>
  (byte >= 0x30 && byte <= 0x39) ||
  (byte >= 0x41 && byte <= 0x5a) ||
  (byte >= 0x61 && byte <= 0x7a);

/**
 * Replace every byte of the UTF-8 encoding that is not an ASCII letter or
 * digit with '_', so `é` becomes `__`.
 */
const sanitize = (text: string): string => {
  let result = "";
  for (const byte of new TextEncoder().encode(text)) {
    result += isAsciiAlphanumeric(byte) ? String.fromCharCode(byte) : "_";
  }
  return result;
};

/**
 * Derive the identifier used for a file in generated code.
 *
 * Not injective: `a.bin` and `a_bin` both give `file_a_bin`. The registry
 * assembler resolves such collisions.
 */
export const deriveIdentifier = (fileName: string): string =>
  IDENTIFIER_PREFIX + sanitize(fileName);

export const isValidIdentifier = (name: string): boolean =>
  /^[A-Za-z_][A-Za-z0-9_]*$/.test(name);

export const isCppKeyword = (name: string): boolean => CPP_KEYWORDS.has(name);

/**
 * Split and check a namespace name such as `assets` or `game::assets`
 */
export const validateNamespace = (
  namespaceName: string
): Result<readonly string[], Diagnostic> => {
  const segments = namespaceName.split("::");

  for (const segment of segments) {
    if (!isValidIdentifier(segment)) {
      return error(
        createDiagnostic(
          "EMB2003",
          "error",
          `Invalid namespace '${namespaceName}': '${segment}' is not a valid C++ identifier`,
          undefined,
          "Use letters, digits and '_', with '::' between nested namespaces"
        )
      );
    }
    if (isCppKeyword(segment)) {
      return error(
        createDiagnostic(
          "EMB2003",
          "error",
          `Invalid namespace '${namespaceName}': '${segment}' is a C++ keyword`
        )
      );
    }
  }

  return ok(segments);
};

/**
 * Include guard for the declaration document
 */
export const makeGuardToken = (namespaceName: string | undefined): string =>
  `GENERATED_BINEMBED_${sanitize(namespaceName ?? "")}_H`;
