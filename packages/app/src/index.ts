export { decodeValue, encodeValue, isControlCode } from "./core/codec.js"
export type { CodecOptions, Encoded } from "./core/codec.js"
export {
  continuationCandidates,
  DEFAULT_CONTINUATION_CHARS,
  DEFAULT_MAX_WIDTH,
  resolveReadOptions,
  resolveWriteOptions
} from "./core/config.js"
export type { ReadOptions, ReadOverrides, WriteOptions, WriteOverrides } from "./core/config.js"
export type * from "./core/errors.js"
export { splitLines } from "./core/lines.js"
export { DEFAULT_MAX_LITERAL_DEPTH, formatLiteral, parseLiteral } from "./core/literal.js"
export { v8Serializer } from "./core/opaque.js"
export type { OpaqueSerializer } from "./core/opaque.js"
export { readConfigLines } from "./core/reader.js"
export { renderLine } from "./core/render.js"
export type { Rendered, RenderOptions } from "./core/render.js"
export { renderDiagnostic } from "./core/report.js"
export type { ConfigMap, Diagnostic, ReadResult, StructureEntry, WriteResult } from "./core/types.js"
export * from "./core/value.js"
export { validateKey, writeConfigLines } from "./core/writer.js"
export { readConfigFile, readConfigFileOrEmpty, writeConfigFile } from "./shell/config-file.js"
export { StderrLoggerLive } from "./shell/logger.js"
