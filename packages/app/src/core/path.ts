import * as Either from "effect/Either"

import type { AccessError, LookupError } from "./errors.js"
import { element, lookupMember, member } from "./handle.js"
import type { Handle } from "./value.js"
import { isKind } from "./value.js"

// CHANGE: resolve dotted paths ("nodes.0.leaf") through the indexing operators
// PURITY: CORE
// INVARIANT: Array segments are decimal integers; every other segment is an Object key
// COMPLEXITY: O(d) where d = number of segments

const INDEX_SEGMENT = /^\d+$/u

export const splitPath = (path: string): ReadonlyArray<string> => path === "" ? [] : path.split(".")

// A non-numeric segment on an Array goes through `member`, which reports the
// string-key access as a JsonTypeError.
const step = (current: Handle, segment: string): Either.Either<Handle, AccessError> =>
  isKind(current.value, "Array") && INDEX_SEGMENT.test(segment)
    ? element(current, Number(segment))
    : member(current, segment)

const lookupStep = (current: Handle, segment: string): Either.Either<Handle, LookupError> =>
  isKind(current.value, "Array") && INDEX_SEGMENT.test(segment)
    ? element(current, Number(segment))
    : lookupMember(current, segment)

const walk = <E>(
  root: Handle,
  path: string,
  next: (current: Handle, segment: string) => Either.Either<Handle, E>
): Either.Either<Handle, E> => {
  let current = root
  for (const segment of splitPath(path)) {
    const stepped = next(current, segment)
    if (Either.isLeft(stepped)) {
      return Either.left(stepped.left)
    }
    current = stepped.right
  }
  return Either.right(current)
}

/**
 * Walk `path` from `root`.
 *
 * @returns The Handle at the path, or the first access error met on the way.
 *
 * @pure false
 * @invariant missing Object keys are inserted as Null, as with `member`
 * @complexity O(d)
 */
export const resolvePath = (root: Handle, path: string): Either.Either<Handle, AccessError> => walk(root, path, step)

/**
 * Read-only walk of `path`: a missing Object key fails with JsonKeyError and
 * the tree is left as it was.
 *
 * @pure true
 * @complexity O(d)
 */
export const lookupPath = (root: Handle, path: string): Either.Either<Handle, LookupError> =>
  walk(root, path, lookupStep)
