import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_DEPTH_LIMIT } from "./parse.js"
import type { FloatFormat } from "./write.js"

// CHANGE: implement deterministic CLI parsing for jsontree
// WHY: keep argv decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "check" | "get"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly output: string | undefined
  readonly write: boolean
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly path: string
  readonly indentWidth: number | undefined
  readonly sortKeys: boolean | undefined
  readonly floatFormat: FloatFormat | undefined
  readonly maxDepth: number | undefined
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

type DraftArgs = Omit<CliArgs, "input"> & { readonly input: string | undefined }

type FlagResult = Either.Either<{ readonly next: DraftArgs; readonly consumed: number }, CliError>

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseInteger = (flagName: string, value: string): Either.Either<number, CliError> =>
  /^\d+$/u.test(value)
    ? Either.right(Number(value))
    : Either.left(cliError(`Invalid non-negative integer for --${flagName}: ${value}`))

const parseMaxDepth = (value: string): Either.Either<number, CliError> =>
  Either.flatMap(parseInteger("max-depth", value), (depth) =>
    depth > MAX_DEPTH_LIMIT
      ? Either.left(cliError(`--max-depth must be at most ${MAX_DEPTH_LIMIT}, got ${depth}`))
      : Either.right(depth))

const parseFloatFormat = (value: string): Either.Either<FloatFormat, CliError> =>
  Match.value(value).pipe(
    Match.when("shortest", () => Either.right<FloatFormat>("shortest")),
    Match.when("fixed", () => Either.right<FloatFormat>("fixed")),
    Match.orElse(() => Either.left(cliError(`Unknown float format: ${value}`)))
  )

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): DraftArgs => ({
  command,
  input: undefined,
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

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = <A>(
  flagName: string,
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: DraftArgs, value: A) => DraftArgs
): FlagResult =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: DraftArgs, value: boolean) => DraftArgs
): FlagResult => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

const asString = (value: string): Either.Either<string, CliError> => Either.right(value)

type FlagParser = (
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagResult

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => Either.right({ next: { ...current, silent: true }, consumed: 1 }),
  write: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      write: value
    })),
  "sort-keys": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      sortKeys: value
    })),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      input: value
    })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      output: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      path: value
    })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (raw) => parseInteger("indent", raw), (args, value) => ({
      ...args,
      indentWidth: value
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag(
      "max-depth",
      current,
      inlineValue,
      nextValue,
      parseMaxDepth,
      (args, value) => ({
        ...args,
        maxDepth: value
      })
    ),
  "float-format": (current, inlineValue, nextValue) =>
    parseValueFlag("float-format", current, inlineValue, nextValue, parseFloatFormat, (args, value) => ({
      ...args,
      floatFormat: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: DraftArgs
): FlagResult => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "format", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: DraftArgs
): Either.Either<DraftArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const finalize = (draft: DraftArgs): Either.Either<CliArgs, CliError> => {
  const { input } = draft
  if (input === undefined || input === "") {
    return Either.left(cliError("Missing value for --input"))
  }
  if (draft.write && draft.output !== undefined) {
    return Either.left(cliError("--write and --output can not be combined"))
  }
  return Either.right({ ...draft, input })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to format when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), finalize)
}
