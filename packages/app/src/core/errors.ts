import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { SourcePosition } from "./cursor.js"
import type { Kind } from "./value.js"

// CHANGE: unify the error algebra for the value tree, parser, writer and CLI
// WHY: every failure is a typed record that callers match on by _tag
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type JsonSyntaxError = {
  readonly _tag: "JsonSyntaxError"
  readonly position: SourcePosition
  readonly expected: string
  readonly actual: string
  readonly excerpt: string
  readonly message: string
}

export type IndexAccess = "key" | "index"

export type JsonTypeError = {
  readonly _tag: "JsonTypeError"
  readonly kind: Kind
  readonly access: IndexAccess
  readonly message: string
}

export type JsonIndexError = {
  readonly _tag: "JsonIndexError"
  readonly index: number
  readonly length: number
  readonly message: string
}

export type JsonKeyError = {
  readonly _tag: "JsonKeyError"
  readonly key: string
  readonly message: string
}

export type JsonCastError = {
  readonly _tag: "JsonCastError"
  readonly requested: Kind
  readonly actual: Kind
  readonly message: string
}

export type JsonWriteError = {
  readonly _tag: "JsonWriteError"
  readonly path: string
  readonly message: string
}

export type AccessError = JsonTypeError | JsonIndexError

export type LookupError = AccessError | JsonKeyError

export type JsonError =
  | JsonSyntaxError
  | JsonTypeError
  | JsonIndexError
  | JsonKeyError
  | JsonCastError
  | JsonWriteError

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError = JsonError | CliError | ConfigError | FileError

export const jsonSyntaxError = (
  position: SourcePosition,
  expected: string,
  actual: string,
  excerpt: string
): JsonSyntaxError => ({
  _tag: "JsonSyntaxError",
  position,
  expected,
  actual,
  excerpt,
  message: `Expected ${expected}, got ${actual} at line ${position.line + 1}, column ${position.column + 1}\n` +
    excerpt
})

const accessLabel = (access: IndexAccess): string => access === "key" ? "a string key" : "an integer index"

export const jsonTypeError = (kind: Kind, access: IndexAccess): JsonTypeError => ({
  _tag: "JsonTypeError",
  kind,
  access,
  message: `Value of kind ${kind} can not be indexed by ${accessLabel(access)}`
})

export const jsonIndexError = (index: number, length: number): JsonIndexError => ({
  _tag: "JsonIndexError",
  index,
  length,
  message: `Index ${index} is out of range for an Array of length ${length}`
})

export const jsonKeyError = (key: string): JsonKeyError => ({
  _tag: "JsonKeyError",
  key,
  message: `Key ${JSON.stringify(key)} is not present`
})

export const jsonCastError = (requested: Kind, actual: Kind): JsonCastError => ({
  _tag: "JsonCastError",
  requested,
  actual,
  message: `Invalid cast from ${actual} to ${requested}`
})

export const jsonWriteError = (path: string, message: string): JsonWriteError => ({
  _tag: "JsonWriteError",
  path,
  message: `${message} at ${path}`
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render any application error as a single human-readable message.
 *
 * @pure true
 * @invariant output is non-empty for every tag
 */
export const describeError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("JsonSyntaxError", (e) => `Syntax error: ${e.message}`),
    Match.tag("JsonTypeError", (e) => `Type error: ${e.message}`),
    Match.tag("JsonIndexError", (e) => `Index error: ${e.message}`),
    Match.tag("JsonKeyError", (e) => `Key error: ${e.message}`),
    Match.tag("JsonCastError", (e) => `Cast error: ${e.message}`),
    Match.tag("JsonWriteError", (e) => `Write error: ${e.message}`),
    Match.tag("CliError", (e) => `Usage error: ${e.message}`),
    Match.tag("ConfigError", (e) => `Config error: ${e.message}`),
    Match.tag("FileError", (e) => `File error: ${e.message}`),
    Match.exhaustive
  )
