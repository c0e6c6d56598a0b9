import * as Either from "effect/Either"

import type { AccessError, JsonCastError, JsonKeyError, JsonTypeError } from "./errors.js"
import { jsonCastError, jsonIndexError, jsonKeyError, jsonTypeError } from "./errors.js"
import type { Handle, JsonArray, JsonObject, Kind, Value, ValueOf } from "./value.js"
import { assignFrom, copyValue, equals as equalValues, isKind, nullValue } from "./value.js"

// CHANGE: expose the caller-facing Handle with explicit alias/assign/clone operations
// WHY: sharing and detaching a referent are named operations instead of implicit copy rules
// FORMAT THEOREM: ∀h: alias(h).value = h.value ∧ assign(alias(h), v) → h.value unchanged
// PURITY: CORE
// EFFECT: Handle and container mutation
// INVARIANT: a Handle refers to exactly one Value at a time
// COMPLEXITY: O(1) indexing, O(n) clone

export type { Handle } from "./value.js"

export const make = (value: Value): Handle => ({ value })

/** New Handle sharing the referent of `handle`. */
export const alias = (handle: Handle): Handle => ({ value: handle.value })

/** New Handle with a deep copy of the referent. */
export const clone = (handle: Handle): Handle => ({ value: copyValue(handle.value) })

const isHandle = (target: Value | Handle): target is Handle => !("_tag" in target)

/**
 * Repoint `handle` at a Value, or at the referent of another Handle.
 * The previous referent is left untouched.
 *
 * @pure false
 * @invariant kind of the new referent is unrestricted
 * @complexity O(1)
 */
export const assign = (handle: Handle, target: Value | Handle): Handle => {
  handle.value = isHandle(target) ? target.value : target
  return handle
}

export const kind = (handle: Handle): Kind => handle.value._tag

export const equals = (left: Handle, right: Handle): boolean => equalValues(left.value, right.value)

/**
 * Same-kind payload copy into the referent of `handle`.
 *
 * @returns JsonCastError when the kinds differ; the referent is then unchanged.
 */
export const assignFromHandle = (handle: Handle, source: Handle): Either.Either<Handle, JsonCastError> =>
  Either.map(assignFrom(handle.value, source.value), () => handle)

/**
 * Checked narrowing of the referent to one concrete kind.
 *
 * @param handle - Handle to inspect.
 * @param requested - Kind the caller expects.
 * @returns The narrowed Value or a JsonCastError naming both kinds.
 *
 * @pure true
 * @complexity O(1)
 */
export const cast = <K extends Kind>(
  handle: Handle,
  requested: K
): Either.Either<ValueOf<K>, JsonCastError> => {
  const value = handle.value
  return isKind(value, requested)
    ? Either.right(value)
    : Either.left(jsonCastError(requested, value._tag))
}

export const getString = (handle: Handle): Either.Either<string, JsonCastError> =>
  Either.map(cast(handle, "String"), (value) => value.value)

export const getNumber = (handle: Handle): Either.Either<number, JsonCastError> =>
  Either.map(cast(handle, "Number"), (value) => value.value)

export const getBoolean = (handle: Handle): Either.Either<boolean, JsonCastError> =>
  Either.map(cast(handle, "Boolean"), (value) => value.value)

export const getItems = (handle: Handle): Either.Either<Array<Handle>, JsonCastError> =>
  Either.map(cast(handle, "Array"), (value: JsonArray) => value.items)

export const getEntries = (handle: Handle): Either.Either<Map<string, Handle>, JsonCastError> =>
  Either.map(cast(handle, "Object"), (value: JsonObject) => value.entries)

/**
 * Slot stored under `key` in an Object. Missing keys are inserted with a
 * Null placeholder, so the returned Handle can be assigned to.
 *
 * @returns JsonTypeError when the referent is not an Object.
 *
 * @pure false
 * @invariant on success, entries.has(key)
 * @complexity O(1)
 */
export const member = (handle: Handle, key: string): Either.Either<Handle, JsonTypeError> => {
  const value = handle.value
  if (!isKind(value, "Object")) {
    return Either.left(jsonTypeError(value._tag, "key"))
  }
  const existing = value.entries.get(key)
  if (existing !== undefined) {
    return Either.right(existing)
  }
  const slot = make(nullValue())
  value.entries.set(key, slot)
  return Either.right(slot)
}

/**
 * Existing slot under `key`; unlike `member`, nothing is inserted.
 *
 * @pure true
 * @complexity O(1)
 */
export const lookupMember = (handle: Handle, key: string): Either.Either<Handle, JsonTypeError | JsonKeyError> => {
  const value = handle.value
  if (!isKind(value, "Object")) {
    return Either.left(jsonTypeError(value._tag, "key"))
  }
  const existing = value.entries.get(key)
  return existing === undefined ? Either.left(jsonKeyError(key)) : Either.right(existing)
}

/**
 * Slot at position `index` in an Array.
 *
 * @returns JsonTypeError when the referent is not an Array, JsonIndexError
 * when `index` is not an integer in [0, length).
 *
 * @pure true
 * @complexity O(1)
 */
export const element = (handle: Handle, index: number): Either.Either<Handle, AccessError> => {
  const value = handle.value
  if (!isKind(value, "Array")) {
    return Either.left(jsonTypeError(value._tag, "index"))
  }
  const slot = Number.isInteger(index) ? value.items[index] : undefined
  if (slot === undefined) {
    return Either.left(jsonIndexError(index, value.items.length))
  }
  return Either.right(slot)
}

export const setMember = (
  handle: Handle,
  key: string,
  target: Value | Handle
): Either.Either<Handle, JsonTypeError> => Either.map(member(handle, key), (slot) => assign(slot, target))

/**
 * Append a new slot to an Array and return it.
 *
 * @returns JsonTypeError when the referent is not an Array.
 */
export const append = (handle: Handle, target: Value | Handle): Either.Either<Handle, JsonTypeError> => {
  const value = handle.value
  if (!isKind(value, "Array")) {
    return Either.left(jsonTypeError(value._tag, "index"))
  }
  const slot = assign(make(nullValue()), target)
  value.items.push(slot)
  return Either.right(slot)
}
