import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "./test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields present", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig("{\"indentWidth\": 4, \"floatFormat\": \"fixed\"}"))
      expect(config).toEqual({ indentWidth: 4, floatFormat: "fixed" })
      expect(Object.keys(config)).toEqual(["indentWidth", "floatFormat"])
    }))

  it.effect("accepts maxDepth at the parser limit", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig("{\"maxDepth\": 1000}"))
      expect(config).toEqual({ maxDepth: 1000 })
    }))

  it.effect("rejects values of the wrong type", () =>
    Effect.gen(function*(_) {
      const badFormat = yield* _(Effect.either(decodeConfig("{\"floatFormat\": \"wide\"}")))
      expect(Either.map(Either.flip(badFormat), (error) => error._tag)).toEqual(Either.right("ConfigError"))
      const negative = yield* _(Effect.either(decodeConfig("{\"indentWidth\": -2}")))
      expect(Either.isLeft(negative)).toBe(true)
      const tooDeep = yield* _(Effect.either(decodeConfig("{\"maxDepth\": 1000000}")))
      expect(Either.map(Either.flip(tooDeep), (error) => error._tag)).toEqual(Either.right("ConfigError"))
      const notJson = yield* _(Effect.either(decodeConfig("{indentWidth: 2")))
      expect(Either.isLeft(notJson)).toBe(true)
    }))
})

describe("loadConfigFile", () => {
  it.effect("ignores a missing default config and fails on a missing explicit one", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, ".jsontree.json")
        const implicit = yield* _(loadConfigFile(missing, false))
        expect(implicit).toBeUndefined()
        const explicit = yield* _(Effect.either(loadConfigFile(missing, true)))
        expect(explicit).toEqual(
          Either.left({ _tag: "FileError", message: `Config file not found: ${missing}` })
        )
      })
    ).pipe(provideNodeContext))

  it.effect("decodes an existing file", () =>
    withTempDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const file = yield* _(fixture("settings.json", "{\"sortKeys\": false, \"maxDepth\": 8}"))
        const config = yield* _(loadConfigFile(file, true))
        expect(config).toEqual({ sortKeys: false, maxDepth: 8 })
      })
    ).pipe(provideNodeContext))
})
