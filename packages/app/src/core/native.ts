import { Match } from "effect"
import * as Either from "effect/Either"

import type { JsonWriteError } from "./errors.js"
import { jsonWriteError } from "./errors.js"
import type { Handle, JsonArray, JsonObject, Value } from "./value.js"
import { array, boolean, keysOf, nullValue, number, object, string } from "./value.js"

// CHANGE: convert between plain JavaScript JSON values and value trees
// WHY: host code can build trees from literals and read them back without walking Handles
// FORMAT THEOREM: ∀x ∈ NativeJson: toNative(fromNative(x)) = Right(x') with x' deep-equal to x (object key order aside)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: NativeJson is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(n)

export type NativeJson =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<NativeJson>
  | { readonly [key: string]: NativeJson }

export type NativeObject = { readonly [key: string]: NativeJson }

const isNativeArray = (value: NativeJson): value is ReadonlyArray<NativeJson> => Array.isArray(value)

const fromNativeValue = (value: NativeJson): Value => {
  if (value === null) {
    return nullValue()
  }
  if (typeof value === "boolean") {
    return boolean(value)
  }
  if (typeof value === "number") {
    return number(value)
  }
  if (typeof value === "string") {
    return string(value)
  }
  if (isNativeArray(value)) {
    return array(value.map((item) => ({ value: fromNativeValue(item) })))
  }
  return object(Object.entries(value).map(([key, item]): [string, Handle] => [key, { value: fromNativeValue(item) }]))
}

/**
 * Build a fresh tree from a plain JSON value.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromNative = (value: NativeJson): Handle => ({ value: fromNativeValue(value) })

type Converted = Either.Either<NativeJson, JsonWriteError>

const cyclic = (path: string): Converted =>
  Either.left(jsonWriteError(path, "Cannot convert cyclic reference"))

const toNativeItems = (value: JsonArray, path: string, visiting: Set<Value>): Converted => {
  const items: Array<NativeJson> = []
  for (const [index, item] of value.items.entries()) {
    const converted = toNativeValue(item.value, `${path}[${index}]`, visiting)
    if (Either.isLeft(converted)) {
      return converted
    }
    items.push(converted.right)
  }
  return Either.right(items)
}

const toNativeEntries = (value: JsonObject, path: string, visiting: Set<Value>): Converted => {
  const entries: Array<[string, NativeJson]> = []
  for (const key of keysOf(value)) {
    const entry = value.entries.get(key)
    if (entry === undefined) {
      continue
    }
    const converted = toNativeValue(entry.value, `${path}[${JSON.stringify(key)}]`, visiting)
    if (Either.isLeft(converted)) {
      return converted
    }
    entries.push([key, converted.right])
  }
  return Either.right(Object.fromEntries(entries))
}

const toNativeContainer = (value: Value, path: string, visiting: Set<Value>, convert: () => Converted): Converted => {
  if (visiting.has(value)) {
    return cyclic(path)
  }
  visiting.add(value)
  const converted = convert()
  visiting.delete(value)
  return converted
}

const toNativeValue = (value: Value, path: string, visiting: Set<Value>): Converted =>
  Match.value(value).pipe(
    Match.tag("String", (v): Converted => Either.right(v.value)),
    Match.tag("Number", (v): Converted => Either.right(v.value)),
    Match.tag("Boolean", (v): Converted => Either.right(v.value)),
    Match.tag("Null", (): Converted => Either.right(null)),
    Match.tag("Array", (v): Converted => toNativeContainer(v, path, visiting, () => toNativeItems(v, path, visiting))),
    Match.tag("Object", (v): Converted => toNativeContainer(v, path, visiting, () => toNativeEntries(v, path, visiting))),
    Match.exhaustive
  )

/**
 * Snapshot a tree as plain JSON; object properties are inserted in sorted key order.
 *
 * @returns JsonWriteError when a container contains itself.
 *
 * @pure true
 * @complexity O(n log n)
 */
export const toNative = (handle: Handle): Either.Either<NativeJson, JsonWriteError> =>
  toNativeValue(handle.value, "$", new Set())
