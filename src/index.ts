export {
  DecodingError,
  DuplicateKeyError,
  EncodingError,
  IllegalConfigurationError,
  IndexOutOfRangeError,
  NullArgumentError,
  ObfuscationError,
  StreamClosedError,
} from "./errors.js";
export { Obfuscated, Obfuscator, all, fixedLength, none } from "./obfuscator.js";
export { ObfuscatingWriter } from "./obfuscating-writer.js";
export {
  CASE_INSENSITIVE,
  CASE_SENSITIVE,
  type CaseSensitivity,
  ObfuscatorRegistry,
  RegistryBuilder,
  type RegistryEntry,
} from "./registry.js";
export {
  LimitConfigurer,
  RequestParameterObfuscator,
  RequestParameterObfuscatorBuilder,
  type RequestParameterObfuscatorOptions,
} from "./request-parameter-obfuscator.js";
export {
  HeaderObfuscator,
  HeaderObfuscatorBuilder,
  type HeaderRecord,
  SENSITIVE_HEADERS,
} from "./http/headers.js";
export { type Charset, percentDecode, percentEncode, resolveCharset } from "./percent-encoding.js";
export { DEFAULT_TRUNCATED_INDICATOR } from "./limit.js";
export { type Appendable, TextBuffer, type TextChunks, decodeChunks, writableAppendable } from "./text.js";
export {
  CONFIG_ENV,
  type ObfuscationConfig,
  type ObfuscatorSpec,
  createHeaderObfuscator,
  createObfuscator,
  createRequestParameterObfuscator,
  loadObfuscationConfig,
  parseObfuscationConfig,
  readObfuscationConfigFile,
} from "./config.js";
