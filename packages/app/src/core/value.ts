import { Match } from "effect"
import * as Either from "effect/Either"
import * as Order from "effect/Order"

import type { JsonCastError } from "./errors.js"
import { jsonCastError } from "./errors.js"

// CHANGE: model JSON values as a closed tagged union over six kinds
// WHY: every consumer matches kinds exhaustively, so an unhandled kind is a compile error
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ Kind ∧ v._tag is fixed at construction
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Object keys are unique; Array order is positional
// COMPLEXITY: O(1) construction, O(n) equality and copy

export type Kind = "String" | "Number" | "Object" | "Array" | "Boolean" | "Null"

/**
 * Mutable cell referring to exactly one Value. Containers store Handles, so
 * repointing a slot never touches the Value it referred to before.
 */
export interface Handle {
  value: Value
}

export interface JsonString {
  readonly _tag: "String"
  value: string
}

export interface JsonNumber {
  readonly _tag: "Number"
  value: number
}

export interface JsonBoolean {
  readonly _tag: "Boolean"
  value: boolean
}

export interface JsonNull {
  readonly _tag: "Null"
}

export interface JsonArray {
  readonly _tag: "Array"
  items: Array<Handle>
}

export interface JsonObject {
  readonly _tag: "Object"
  entries: Map<string, Handle>
}

export type Value = JsonString | JsonNumber | JsonBoolean | JsonNull | JsonArray | JsonObject

export type ValueOf<K extends Kind> = Extract<Value, { readonly _tag: K }>

export const string = (value: string): JsonString => ({ _tag: "String", value })

export const number = (value: number): JsonNumber => ({ _tag: "Number", value })

export const boolean = (value: boolean): JsonBoolean => ({ _tag: "Boolean", value })

export const nullValue = (): JsonNull => ({ _tag: "Null" })

export const array = (items: ReadonlyArray<Handle> = []): JsonArray => ({
  _tag: "Array",
  items: [...items]
})

export const object = (
  entries: Iterable<readonly [string, Handle]> = []
): JsonObject => ({
  _tag: "Object",
  entries: new Map(entries)
})

export const kindOf = (value: Value): Kind => value._tag

export const isKind = <K extends Kind>(value: Value, kind: K): value is ValueOf<K> => value._tag === kind

/**
 * Keys of an object in serialization order.
 *
 * @param sortKeys - Ordinal key order when true, insertion order otherwise.
 *
 * @pure true
 * @invariant result has no duplicates
 * @complexity O(n log n)
 */
export const keysOf = (value: JsonObject, sortKeys = true): ReadonlyArray<string> => {
  const keys = [...value.entries.keys()]
  return sortKeys ? keys.sort(Order.string) : keys
}

// Container pairs currently being compared; meeting one again means a cycle
// that has matched so far.
type Comparing = Map<Value, Set<Value>>

const withPair = (left: Value, right: Value, comparing: Comparing, compare: () => boolean): boolean => {
  const pending = comparing.get(left) ?? new Set<Value>()
  if (pending.has(right)) {
    return true
  }
  pending.add(right)
  comparing.set(left, pending)
  const result = compare()
  pending.delete(right)
  return result
}

const equalArrays = (left: JsonArray, right: Value, comparing: Comparing): boolean => {
  if (!isKind(right, "Array") || right.items.length !== left.items.length) {
    return false
  }
  const items = right.items
  return withPair(left, right, comparing, () =>
    left.items.every((item, index) => {
      const other = items[index]
      return other !== undefined && equalsWithin(item.value, other.value, comparing)
    }))
}

const equalObjects = (left: JsonObject, right: Value, comparing: Comparing): boolean => {
  if (!isKind(right, "Object") || right.entries.size !== left.entries.size) {
    return false
  }
  const entries = right.entries
  return withPair(left, right, comparing, () => {
    for (const [key, handle] of left.entries) {
      const other = entries.get(key)
      if (other === undefined || !equalsWithin(handle.value, other.value, comparing)) {
        return false
      }
    }
    return true
  })
}

const equalsWithin = (left: Value, right: Value, comparing: Comparing): boolean =>
  Match.value(left).pipe(
    Match.tag("String", (l) => isKind(right, "String") && l.value === right.value),
    Match.tag("Number", (l) => isKind(right, "Number") && l.value === right.value),
    Match.tag("Boolean", (l) => isKind(right, "Boolean") && l.value === right.value),
    Match.tag("Null", () => isKind(right, "Null")),
    Match.tag("Array", (l) => equalArrays(l, right, comparing)),
    Match.tag("Object", (l) => equalObjects(l, right, comparing)),
    Match.exhaustive
  )

/**
 * Structural equality between two values of the same kind.
 * Trees that contain themselves compare equal when every path matches.
 *
 * @returns false for values of different kinds.
 *
 * @pure true
 * @invariant equals(a, b) → kindOf(a) = kindOf(b)
 * @complexity O(n) where n = number of nodes
 */
export const equals = (left: Value, right: Value): boolean => equalsWithin(left, right, new Map())

/**
 * Copy the payload of `source` into `target` in place.
 * Container slots are re-created as new Handles that share the source's
 * Values, so repointing a slot of one container leaves the other intact.
 *
 * @returns the updated target, or JsonCastError when the kinds differ.
 *
 * @pure false
 * @invariant kindOf(target) is unchanged
 * @complexity O(n) where n = number of direct slots
 */
export const assignFrom = (target: Value, source: Value): Either.Either<Value, JsonCastError> => {
  if (isKind(target, "String") && isKind(source, "String")) {
    target.value = source.value
    return Either.right(target)
  }
  if (isKind(target, "Number") && isKind(source, "Number")) {
    target.value = source.value
    return Either.right(target)
  }
  if (isKind(target, "Boolean") && isKind(source, "Boolean")) {
    target.value = source.value
    return Either.right(target)
  }
  if (isKind(target, "Null") && isKind(source, "Null")) {
    return Either.right(target)
  }
  if (isKind(target, "Array") && isKind(source, "Array")) {
    target.items = source.items.map((item) => ({ value: item.value }))
    return Either.right(target)
  }
  if (isKind(target, "Object") && isKind(source, "Object")) {
    target.entries = new Map(
      [...source.entries].map(([key, item]): [string, Handle] => [key, { value: item.value }])
    )
    return Either.right(target)
  }
  return Either.left(jsonCastError(target._tag, source._tag))
}

const copyWithin = (value: Value, copies: Map<Value, Value>): Value => {
  const existing = copies.get(value)
  if (existing !== undefined) {
    return existing
  }
  return Match.value(value).pipe(
    Match.tag("String", (v): Value => remember(v, string(v.value), copies)),
    Match.tag("Number", (v): Value => remember(v, number(v.value), copies)),
    Match.tag("Boolean", (v): Value => remember(v, boolean(v.value), copies)),
    Match.tag("Null", (v): Value => remember(v, nullValue(), copies)),
    Match.tag("Array", (v): Value => {
      const copy = remember(v, array(), copies)
      copy.items = v.items.map((item) => ({ value: copyWithin(item.value, copies) }))
      return copy
    }),
    Match.tag("Object", (v): Value => {
      const copy = remember(v, object(), copies)
      for (const [key, item] of v.entries) {
        copy.entries.set(key, { value: copyWithin(item.value, copies) })
      }
      return copy
    }),
    Match.exhaustive
  )
}

const remember = <V extends Value>(source: Value, copy: V, copies: Map<Value, Value>): V => {
  copies.set(source, copy)
  return copy
}

/**
 * Deep copy sharing no Value with the input. A Value reached twice is copied
 * once, so shared slots and cycles keep their shape in the copy.
 *
 * @pure true
 * @complexity O(n)
 */
export const copyValue = (value: Value): Value => copyWithin(value, new Map())
