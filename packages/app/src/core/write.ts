import { Match } from "effect"
import * as Either from "effect/Either"

import type { JsonWriteError } from "./errors.js"
import { jsonWriteError } from "./errors.js"
import type { Handle, JsonArray, JsonObject, Value } from "./value.js"
import { keysOf } from "./value.js"

// CHANGE: render a value tree as canonical JSON text
// WHY: objects are multi-line and indented, arrays stay on one line, keys sorted by default
// FORMAT THEOREM: ∀h: render(h) = Right(s) → parse(s) ≡ h structurally (modulo \u passthrough)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the tree is never mutated while rendering
// COMPLEXITY: O(n) where n = number of nodes plus total string length

export type FloatFormat = "shortest" | "fixed"

export interface FormatSettings {
  readonly indentWidth: number
  readonly sortKeys: boolean
  readonly floatFormat: FloatFormat
}

export type FormatOptions = Partial<FormatSettings>

export const defaultFormatSettings: FormatSettings = {
  indentWidth: 2,
  sortKeys: true,
  floatFormat: "shortest"
}

type Rendered = Either.Either<string, JsonWriteError>

const NAMED_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\\", "\\\\"],
  ["\"", "\\\""],
  ["\b", "\\b"],
  ["\f", "\\f"],
  ["\n", "\\n"],
  ["\r", "\\r"],
  ["\t", "\\t"],
  ["\u2028", "\\u2028"],
  ["\u2029", "\\u2029"]
])

const escapeChar = (char: string): string => {
  const named = NAMED_ESCAPES.get(char)
  if (named !== undefined) {
    return named
  }
  const code = char.charCodeAt(0)
  return code <= 0x1f ? `\\u${code.toString(16).padStart(4, "0")}` : char
}

/**
 * Quote and escape a string for JSON output.
 *
 * @pure true
 * @invariant result starts and ends with a double quote
 * @complexity O(n)
 */
export const quoteString = (value: string): string => {
  let result = "\""
  for (const char of value) {
    result += escapeChar(char)
  }
  return `${result}"`
}

/**
 * Format a finite number.
 *
 * `shortest` is the shortest decimal that reads back as the same double;
 * `fixed` always writes six fractional digits.
 */
export const formatNumber = (value: number, format: FloatFormat): string =>
  format === "fixed" ? value.toFixed(6) : String(value)

const renderNumber = (value: number, path: string, settings: FormatSettings): Rendered =>
  Number.isFinite(value)
    ? Either.right(formatNumber(value, settings.floatFormat))
    : Either.left(jsonWriteError(path, `Cannot serialize non-finite number ${String(value)}`))

const memberPath = (path: string, key: string): string =>
  /^[A-Za-z_$][\w$]*$/u.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`

interface RenderContext {
  readonly settings: FormatSettings
  // containers on the current path from the root
  readonly visiting: Set<Value>
}

const enter = (value: Value, path: string, context: RenderContext, render: () => Rendered): Rendered => {
  if (context.visiting.has(value)) {
    return Either.left(jsonWriteError(path, "Cannot serialize cyclic reference"))
  }
  context.visiting.add(value)
  const rendered = render()
  context.visiting.delete(value)
  return rendered
}

const renderArray = (value: JsonArray, level: number, path: string, context: RenderContext): Rendered => {
  const parts: Array<string> = []
  for (const [index, item] of value.items.entries()) {
    const rendered = renderValue(item.value, level, `${path}[${index}]`, context)
    if (Either.isLeft(rendered)) {
      return rendered
    }
    parts.push(rendered.right)
  }
  return Either.right(`[${parts.join(", ")}]`)
}

const renderObject = (value: JsonObject, level: number, path: string, context: RenderContext): Rendered => {
  const { settings } = context
  const keys = keysOf(value, settings.sortKeys)
  if (keys.length === 0) {
    return Either.right("{}")
  }
  const inner = " ".repeat((level + 1) * settings.indentWidth)
  const outer = " ".repeat(level * settings.indentWidth)
  const parts: Array<string> = []
  for (const key of keys) {
    const entry = value.entries.get(key)
    if (entry === undefined) {
      continue
    }
    const rendered = renderValue(entry.value, level + 1, memberPath(path, key), context)
    if (Either.isLeft(rendered)) {
      return rendered
    }
    parts.push(`${quoteString(key)}: ${rendered.right}`)
  }
  return Either.right(`{\n${inner}${parts.join(`,\n${inner}`)}\n${outer}}`)
}

const renderValue = (value: Value, level: number, path: string, context: RenderContext): Rendered =>
  Match.value(value).pipe(
    Match.tag("String", (v): Rendered => Either.right(quoteString(v.value))),
    Match.tag("Number", (v): Rendered => renderNumber(v.value, path, context.settings)),
    Match.tag("Boolean", (v): Rendered => Either.right(v.value ? "true" : "false")),
    Match.tag("Null", (): Rendered => Either.right("null")),
    Match.tag("Array", (v): Rendered => enter(v, path, context, () => renderArray(v, level, path, context))),
    Match.tag("Object", (v): Rendered => enter(v, path, context, () => renderObject(v, level, path, context))),
    Match.exhaustive
  )

export const resolveFormatSettings = (options: FormatOptions = {}): FormatSettings => ({
  indentWidth: options.indentWidth ?? defaultFormatSettings.indentWidth,
  sortKeys: options.sortKeys ?? defaultFormatSettings.sortKeys,
  floatFormat: options.floatFormat ?? defaultFormatSettings.floatFormat
})

/**
 * Render a value tree as canonical JSON text (no trailing newline).
 *
 * @param handle - Root of the tree.
 * @param options - Indentation, key order and number format.
 * @returns Either with the text, or a JsonWriteError locating a non-finite number
 * or a container that contains itself.
 *
 * @pure true
 * @invariant arrays never contain a newline of their own
 * @complexity O(n)
 */
export const renderJson = (handle: Handle, options: FormatOptions = {}): Either.Either<string, JsonWriteError> =>
  renderValue(handle.value, 0, "$", { settings: resolveFormatSettings(options), visiting: new Set() })
