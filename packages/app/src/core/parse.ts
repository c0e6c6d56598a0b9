import * as Either from "effect/Either"

import type { Cursor, SourcePosition } from "./cursor.js"
import {
  advance,
  advanceBy,
  atEnd,
  describeChar,
  excerptAt,
  makeCursor,
  peek,
  positionOf,
  skipWhitespace
} from "./cursor.js"
import type { JsonSyntaxError } from "./errors.js"
import { jsonSyntaxError } from "./errors.js"
import type { Handle, Value } from "./value.js"
import { array, boolean, nullValue, number, object, string } from "./value.js"

// CHANGE: recursive-descent parser from a complete text buffer into a value tree
// WHY: callers get either the tree or a positioned syntax error, never a masked default
// FORMAT THEOREM: ∀s: parse(s) = Right(h) → s is exactly one JSON value surrounded by whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: container nesting never exceeds maxDepth
// COMPLEXITY: O(n) where n = text length

export interface ParseOptions {
  /** Max container nesting depth (default 256, clamped to MAX_DEPTH_LIMIT). */
  readonly maxDepth?: number
}

export const DEFAULT_MAX_DEPTH = 256

/** Deepest nesting any caller may ask for; recursion stays well inside the call stack. */
export const MAX_DEPTH_LIMIT = 1000

const BYTE_ORDER_MARK = "\uFEFF"

interface Reader {
  readonly cursor: Cursor
  readonly maxDepth: number
}

type Parsed<A> = Either.Either<A, JsonSyntaxError>

const NUMBER_LITERAL = /-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/uy

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\"", "\""],
  ["\\", "\\"],
  ["/", "/"],
  ["b", "\b"],
  ["f", "\f"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"]
])

const failAt = <A>(
  reader: Reader,
  position: SourcePosition,
  expected: string,
  actual: string
): Parsed<A> => Either.left(jsonSyntaxError(position, expected, actual, excerptAt(reader.cursor.text, position)))

const failHere = <A>(reader: Reader, expected: string): Parsed<A> =>
  failAt(reader, positionOf(reader.cursor), expected, describeChar(peek(reader.cursor)))

const handle = (value: Value): Handle => ({ value })

const parseStringBody = (reader: Reader): Parsed<string> => {
  const cursor = reader.cursor
  advance(cursor)
  let result = ""
  for (;;) {
    const position = positionOf(cursor)
    const char = advance(cursor)
    if (char === undefined || char === "\n" || char === "\r") {
      return failAt(reader, position, "closing quote", describeChar(char))
    }
    if (char === "\"") {
      return Either.right(result)
    }
    if (char !== "\\") {
      result += char
      continue
    }
    const escapePosition = positionOf(cursor)
    const escaped = advance(cursor)
    if (escaped === undefined) {
      return failAt(reader, escapePosition, "closing quote", describeChar(escaped))
    }
    if (escaped === "u") {
      // \u is kept verbatim; the hex digits follow as ordinary characters
      result += "\\u"
      continue
    }
    const decoded = SIMPLE_ESCAPES.get(escaped)
    if (decoded === undefined) {
      return failAt(reader, escapePosition, "a valid escape sequence", describeChar(escaped))
    }
    result += decoded
  }
}

const parseNumber = (reader: Reader): Parsed<Value> => {
  const cursor = reader.cursor
  const position = positionOf(cursor)
  NUMBER_LITERAL.lastIndex = cursor.offset
  const match = NUMBER_LITERAL.exec(cursor.text)
  if (match === null) {
    return failHere(reader, "a number")
  }
  const lexeme = match[0]
  const parsed = Number(lexeme)
  if (!Number.isFinite(parsed)) {
    return failAt(reader, position, "a finite number", JSON.stringify(lexeme))
  }
  advanceBy(cursor, lexeme.length)
  return Either.right(number(parsed))
}

const parseLiteral = (reader: Reader, word: string, value: () => Value): Parsed<Value> => {
  const cursor = reader.cursor
  if (!cursor.text.startsWith(word, cursor.offset)) {
    const found = cursor.text.slice(cursor.offset, cursor.offset + word.length)
    return failAt(reader, positionOf(cursor), JSON.stringify(word), JSON.stringify(found))
  }
  advanceBy(cursor, word.length)
  return Either.right(value())
}

const checkDepth = (reader: Reader, depth: number): Parsed<number> =>
  depth > reader.maxDepth
    ? failAt(reader, positionOf(reader.cursor), `nesting depth at most ${reader.maxDepth}`, `depth ${depth}`)
    : Either.right(depth)

const parseArray = (reader: Reader, depth: number): Parsed<Value> => {
  const cursor = reader.cursor
  const depthCheck = checkDepth(reader, depth)
  if (Either.isLeft(depthCheck)) {
    return Either.left(depthCheck.left)
  }
  advance(cursor)
  const items: Array<Handle> = []
  skipWhitespace(cursor)
  if (peek(cursor) === "]") {
    advance(cursor)
    return Either.right(array(items))
  }
  for (;;) {
    const item = parseValue(reader, depth)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(handle(item.right))
    skipWhitespace(cursor)
    const position = positionOf(cursor)
    const separator = advance(cursor)
    if (separator === "]") {
      return Either.right(array(items))
    }
    if (separator !== ",") {
      return failAt(reader, position, "\",\" or \"]\"", describeChar(separator))
    }
  }
}

const parseObject = (reader: Reader, depth: number): Parsed<Value> => {
  const cursor = reader.cursor
  const depthCheck = checkDepth(reader, depth)
  if (Either.isLeft(depthCheck)) {
    return Either.left(depthCheck.left)
  }
  advance(cursor)
  const result = object()
  skipWhitespace(cursor)
  if (peek(cursor) === "}") {
    advance(cursor)
    return Either.right(result)
  }
  for (;;) {
    skipWhitespace(cursor)
    if (peek(cursor) !== "\"") {
      return failHere(reader, "a string key")
    }
    const key = parseStringBody(reader)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    skipWhitespace(cursor)
    const colonPosition = positionOf(cursor)
    const colon = advance(cursor)
    if (colon !== ":") {
      return failAt(reader, colonPosition, "\":\"", describeChar(colon))
    }
    const value = parseValue(reader, depth)
    if (Either.isLeft(value)) {
      return value
    }
    result.entries.set(key.right, handle(value.right))
    skipWhitespace(cursor)
    const position = positionOf(cursor)
    const separator = advance(cursor)
    if (separator === "}") {
      return Either.right(result)
    }
    if (separator !== ",") {
      return failAt(reader, position, "\",\" or \"}\"", describeChar(separator))
    }
  }
}

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const parseValue = (reader: Reader, depth: number): Parsed<Value> => {
  skipWhitespace(reader.cursor)
  const char = peek(reader.cursor)
  if (char === "{") {
    return parseObject(reader, depth + 1)
  }
  if (char === "[") {
    return parseArray(reader, depth + 1)
  }
  if (char === "\"") {
    return Either.map(parseStringBody(reader), string)
  }
  if (char === "-" || (char !== undefined && isDigit(char))) {
    return parseNumber(reader)
  }
  if (char === "t") {
    return parseLiteral(reader, "true", () => boolean(true))
  }
  if (char === "f") {
    return parseLiteral(reader, "false", () => boolean(false))
  }
  if (char === "n") {
    return parseLiteral(reader, "null", nullValue)
  }
  return failHere(reader, "a value")
}

/**
 * Parse a complete JSON document into a value tree.
 *
 * @param text - Entire source text.
 * @param options - Parser limits.
 * @returns Either with the root Handle or a positioned JsonSyntaxError.
 *
 * @pure true
 * @invariant trailing non-whitespace input is rejected
 * @invariant one leading U+FEFF is skipped; positions count from the character after it
 * @complexity O(n)
 */
export const parseJson = (text: string, options: ParseOptions = {}): Either.Either<Handle, JsonSyntaxError> => {
  const reader: Reader = {
    cursor: makeCursor(text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text),
    maxDepth: Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT)
  }
  const root = parseValue(reader, 0)
  if (Either.isLeft(root)) {
    return Either.left(root.left)
  }
  skipWhitespace(reader.cursor)
  if (!atEnd(reader.cursor)) {
    return failHere(reader, "end of input")
  }
  return Either.right(handle(root.right))
}
