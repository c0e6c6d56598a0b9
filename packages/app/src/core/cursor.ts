// CHANGE: track offset, line and column while the parser walks the source text
// WHY: syntax errors point at the offending character with an excerpt and caret
// FORMAT THEOREM: ∀c: advance(c) over "\n" → line' = line + 1 ∧ column' = 0
// PURITY: CORE
// EFFECT: mutates the cursor it is given
// INVARIANT: 0 ≤ offset ≤ text.length
// COMPLEXITY: O(1) per character

export interface SourcePosition {
  readonly offset: number
  readonly line: number
  readonly column: number
}

export interface Cursor {
  readonly text: string
  offset: number
  line: number
  column: number
}

export const makeCursor = (text: string): Cursor => ({ text, offset: 0, line: 0, column: 0 })

export const positionOf = (cursor: Cursor): SourcePosition => ({
  offset: cursor.offset,
  line: cursor.line,
  column: cursor.column
})

export const peek = (cursor: Cursor): string | undefined => cursor.text[cursor.offset]

export const atEnd = (cursor: Cursor): boolean => cursor.offset >= cursor.text.length

export const advance = (cursor: Cursor): string | undefined => {
  const char = cursor.text[cursor.offset]
  if (char === undefined) {
    return undefined
  }
  cursor.offset++
  if (char === "\n") {
    cursor.line++
    cursor.column = 0
  } else {
    cursor.column++
  }
  return char
}

// Only for spans known to contain no newline (numbers, literals).
export const advanceBy = (cursor: Cursor, count: number): void => {
  cursor.offset += count
  cursor.column += count
}

const isWhitespace = (char: string | undefined): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r"

export const skipWhitespace = (cursor: Cursor): void => {
  while (isWhitespace(peek(cursor))) {
    advance(cursor)
  }
}

/**
 * Source line at `position` followed by a caret under its column.
 *
 * @pure true
 * @invariant result contains exactly one "\n"
 * @complexity O(n) where n = text length
 */
export const excerptAt = (text: string, position: SourcePosition): string => {
  const raw = text.split("\n")[position.line] ?? ""
  const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw
  return `${line}\n${" ".repeat(position.column)}^`
}

export const describeChar = (char: string | undefined): string =>
  char === undefined ? "end of input" : JSON.stringify(char)
