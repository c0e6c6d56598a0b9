import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import {
  alias,
  append,
  assign,
  assignFromHandle,
  cast,
  clone,
  element,
  equals,
  getBoolean,
  getEntries,
  getNumber,
  getString,
  kind,
  make,
  member,
  setMember
} from "../../src/core/handle.js"
import type { Handle } from "../../src/core/value.js"
import { array, boolean, nullValue, number, object, string } from "../../src/core/value.js"

const numbers = (...values: ReadonlyArray<number>): Handle => make(array(values.map((value) => make(number(value)))))

describe("alias and assign", () => {
  it.effect("mutations through an alias are visible through the original", () =>
    Effect.sync(() => {
      const original = make(object())
      const shared = alias(original)
      setMember(shared, "k", number(1))
      expect(Either.flatMap(member(original, "k"), getNumber)).toEqual(Either.right(1))
    }))

  it.effect("assign on an alias detaches it without touching the original", () =>
    Effect.sync(() => {
      const original = make(object())
      const shared = alias(original)
      assign(shared, string("x"))
      expect(kind(original)).toBe("Object")
      expect(getString(shared)).toEqual(Either.right("x"))
    }))

  it.effect("assign accepts another Handle and shares its referent", () =>
    Effect.sync(() => {
      const source = make(number(5))
      const target = assign(make(nullValue()), source)
      expect(target.value).toBe(source.value)
    }))

  it.effect("clone shares nothing with the original", () =>
    Effect.sync(() => {
      const original = make(object())
      setMember(original, "k", number(1))
      const copy = clone(original)
      setMember(copy, "k", number(2))
      expect(Either.flatMap(member(original, "k"), getNumber)).toEqual(Either.right(1))
      expect(equals(original, copy)).toBe(false)
    }))

  it.effect("clone of a tree that contains itself keeps the cycle", () =>
    Effect.sync(() => {
      const original = make(object())
      setMember(original, "self", original)
      const copy = clone(original)
      expect(copy.value).not.toBe(original.value)
      expect(Either.map(member(copy, "self"), (slot) => slot.value === copy.value)).toEqual(Either.right(true))
      expect(equals(original, copy)).toBe(true)
    }))
})

describe("member", () => {
  it.effect("inserts a Null placeholder for missing keys", () =>
    Effect.sync(() => {
      const root = make(object())
      const slot = member(root, "missing")
      expect(Either.map(slot, kind)).toEqual(Either.right("Null"))
      expect(getEntries(root).pipe(Either.map((entries) => [...entries.keys()]))).toEqual(Either.right(["missing"]))
    }))

  it.effect("fails on non-objects with a type error", () =>
    Effect.sync(() => {
      expect(member(make(number(1)), "a")).toEqual(
        Either.left({
          _tag: "JsonTypeError",
          kind: "Number",
          access: "key",
          message: "Value of kind Number can not be indexed by a string key"
        })
      )
      expect(Either.isLeft(member(make(string("s")), "a"))).toBe(true)
      expect(Either.isLeft(member(numbers(1), "0"))).toBe(true)
    }))
})

describe("element", () => {
  it.effect("indexes arrays in order", () =>
    Effect.sync(() => {
      const root = numbers(3, 1, 2)
      expect([0, 1, 2].map((index) => Either.flatMap(element(root, index), getNumber))).toEqual([
        Either.right(3),
        Either.right(1),
        Either.right(2)
      ])
    }))

  it.effect("fails on non-arrays with a type error", () =>
    Effect.sync(() => {
      expect(element(make(string("s")), 0)).toEqual(
        Either.left({
          _tag: "JsonTypeError",
          kind: "String",
          access: "index",
          message: "Value of kind String can not be indexed by an integer index"
        })
      )
      expect(Either.isLeft(element(make(number(1)), 0))).toBe(true)
      expect(Either.isLeft(element(make(object()), 0))).toBe(true)
    }))

  it.effect("is bounds-checked and integer-only", () =>
    Effect.sync(() => {
      const root = numbers(3, 1, 2)
      expect(element(root, 3)).toEqual(
        Either.left({
          _tag: "JsonIndexError",
          index: 3,
          length: 3,
          message: "Index 3 is out of range for an Array of length 3"
        })
      )
      expect(Either.isLeft(element(root, -1))).toBe(true)
      expect(Either.isLeft(element(root, 1.5))).toBe(true)
    }))
})

describe("append and setMember", () => {
  it.effect("append grows an array and returns the new slot", () =>
    Effect.sync(() => {
      const root = numbers(1)
      const slot = append(root, boolean(true))
      expect(Either.flatMap(slot, getBoolean)).toEqual(Either.right(true))
      expect(Either.flatMap(element(root, 1), getBoolean)).toEqual(Either.right(true))
    }))

  it.effect("append rejects non-arrays", () =>
    Effect.sync(() => {
      expect(Either.map(Either.flip(append(make(object()), nullValue())), (error) => error.access)).toEqual(
        Either.right("index")
      )
    }))

  it.effect("setMember overwrites an existing key", () =>
    Effect.sync(() => {
      const root = make(object())
      setMember(root, "a", number(1))
      setMember(root, "a", string("two"))
      expect(Either.flatMap(member(root, "a"), getString)).toEqual(Either.right("two"))
    }))
})

describe("cast and assignFromHandle", () => {
  it.effect("cast narrows to the requested kind", () =>
    Effect.sync(() => {
      expect(Either.map(cast(make(string("s")), "String"), (value) => value.value)).toEqual(Either.right("s"))
      expect(getString(make(number(1)))).toEqual(
        Either.left({
          _tag: "JsonCastError",
          requested: "String",
          actual: "Number",
          message: "Invalid cast from Number to String"
        })
      )
    }))

  it.effect("assignFromHandle copies the payload in place", () =>
    Effect.sync(() => {
      const target = make(number(1))
      const before = target.value
      assignFromHandle(target, make(number(9)))
      expect(target.value).toBe(before)
      expect(getNumber(target)).toEqual(Either.right(9))
      expect(Either.isLeft(assignFromHandle(target, make(string("x"))))).toBe(true)
      expect(getNumber(target)).toEqual(Either.right(9))
    }))
})
