import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "jsontree", ...args]

const errorMessage = (...args: ReadonlyArray<string>): Either.Either<string, unknown> =>
  Either.map(Either.flip(parseCliArgs(argv(...args))), (error) => error.message)

describe("parseCliArgs", () => {
  it.effect("defaults to format with only --input", () =>
    Effect.sync(() => {
      expect(parseCliArgs(argv("--input", "data.json"))).toEqual(
        Either.right({
          command: "format",
          input: "data.json",
          output: undefined,
          write: false,
          configPath: undefined,
          configPathExplicit: false,
          path: "",
          indentWidth: undefined,
          sortKeys: undefined,
          floatFormat: undefined,
          maxDepth: undefined,
          silent: false
        })
      )
    }))

  it.effect("reads every flag, inline or separate", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(
        argv(
          "check",
          "--input=data.json",
          "--sort-keys=false",
          "--indent",
          "4",
          "--float-format",
          "fixed",
          "--max-depth=10",
          "--config",
          "custom.json",
          "--silent"
        )
      )
      expect(
        Either.map(parsed, (args) => [
          args.command,
          args.input,
          args.sortKeys,
          args.indentWidth,
          args.floatFormat,
          args.maxDepth,
          args.configPath,
          args.configPathExplicit,
          args.silent
        ])
      ).toEqual(Either.right(["check", "data.json", false, 4, "fixed", 10, "custom.json", true, true]))
    }))

  it.effect("treats bare boolean flags as true", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("format", "--sort-keys", "--write", "--input", "a.json"))
      expect(Either.map(parsed, (args) => [args.sortKeys, args.write])).toEqual(Either.right([true, true]))
    }))

  it.effect("reads the get path", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("get", "--input", "a.json", "--path", "nodes.0"))
      expect(Either.map(parsed, (args) => [args.command, args.path])).toEqual(Either.right(["get", "nodes.0"]))
    }))

  it.effect("accepts --max-depth up to the parser limit", () =>
    Effect.sync(() => {
      expect(Either.map(parseCliArgs(argv("--input", "a.json", "--max-depth", "1000")), (args) => args.maxDepth))
        .toEqual(Either.right(1000))
    }))

  it.effect("keeps everything after the first = as the inline value", () =>
    Effect.sync(() => {
      const parsed = parseCliArgs(argv("get", "--input=a=b.json", "--path=k=v"))
      expect(Either.map(parsed, (args) => [args.input, args.path])).toEqual(Either.right(["a=b.json", "k=v"]))
    }))

  it.effect("rejects bad arguments with a CliError", () =>
    Effect.sync(() => {
      expect(errorMessage("lint", "--input", "a.json")).toEqual(Either.right("Unknown command: lint"))
      expect(errorMessage("format")).toEqual(Either.right("Missing value for --input"))
      expect(errorMessage("--input")).toEqual(Either.right("Missing value for --input"))
      expect(errorMessage("--input", "a.json", "--indent", "x")).toEqual(
        Either.right("Invalid non-negative integer for --indent: x")
      )
      expect(errorMessage("--input", "a.json", "--indent", "-1")).toEqual(Either.right("Missing value for --indent"))
      expect(errorMessage("--input", "a.json", "--max-depth", "1001")).toEqual(
        Either.right("--max-depth must be at most 1000, got 1001")
      )
      expect(errorMessage("--input", "a.json", "--float-format", "wide")).toEqual(
        Either.right("Unknown float format: wide")
      )
      expect(errorMessage("--input", "a.json", "--sort-keys=maybe")).toEqual(
        Either.right("Invalid boolean value: maybe")
      )
      expect(errorMessage("--input", "a.json", "--bogus")).toEqual(Either.right("Unknown flag: --bogus"))
      expect(errorMessage("--input", "a.json", "-x")).toEqual(Either.right("Unknown flag: -x"))
      expect(errorMessage("get", "--input", "a.json", "extra")).toEqual(
        Either.right("Unexpected positional argument: extra")
      )
      expect(errorMessage("--input", "a.json", "--write", "--output", "b.json")).toEqual(
        Either.right("--write and --output can not be combined")
      )
    }))

  it.effect("tags errors as CliError", () =>
    Effect.sync(() => {
      expect(Either.map(Either.flip(parseCliArgs(argv("--nope"))), (error) => error._tag)).toEqual(
        Either.right("CliError")
      )
    }))
})
