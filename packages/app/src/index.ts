export * from "./core/errors.js"
export * as Handle from "./core/handle.js"
export type { NativeJson, NativeObject } from "./core/native.js"
export { fromNative, toNative } from "./core/native.js"
export type { ParseOptions } from "./core/parse.js"
export { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, parseJson } from "./core/parse.js"
export { lookupPath, resolvePath, splitPath } from "./core/path.js"
export type { SourcePosition } from "./core/cursor.js"
export * as Value from "./core/value.js"
export type { FloatFormat, FormatOptions, FormatSettings } from "./core/write.js"
export { defaultFormatSettings, formatNumber, quoteString, renderJson } from "./core/write.js"
export { readJsonFile, writeJsonFile } from "./shell/json-file.js"
export { dump, fromText, load, loadOrNull } from "./shell/stream.js"
