/**
 * binembed emitter - literal encoding and C++ document generation
 */

export * from "./types.js";
export {
  DEFAULT_ENCODER_OPTIONS,
  MIN_LINE_WIDTH,
  isLiteralStyle,
  validateEncoderOptions,
  createLiteralEncoder,
  encodeBytes,
  escapeByte,
  toHex2,
  quoteCppString,
} from "./encoder/index.js";
export { decodeLiteral } from "./decoder.js";
export {
  type RegistryOptions,
  assembleRegistry,
  lookupEntry,
} from "./registry.js";
export { emitDeclarationDocument } from "./documents/declaration.js";
export {
  type EmittedFile,
  type DefinitionHooks,
  emitDefinitionDocument,
} from "./documents/definition.js";
export { type StringSink, createStringSink } from "./sink.js";
export {
  type EmbeddedFile,
  type EmbeddedFileTable,
  readDefinitionDocument,
  mustGetFile,
  readDeclarationCount,
} from "./reader.js";
