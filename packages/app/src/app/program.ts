import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { parseJson } from "../core/parse.js"
import { lookupPath } from "../core/path.js"
import type { Handle } from "../core/value.js"
import { renderJson } from "../core/write.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile, readTextFile, writeTextFile } from "../shell/json-file.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: stdout is written at most once per run
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const emit = (payload: string, silent: boolean): Effect.Effect<void> => silent ? Effect.void : writeStdout(payload)

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(either) ? Effect.fail(either.left) : Effect.succeed(either.right)

const loadSettings = (cli: CliArgs): Effect.Effect<ResolvedConfig, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const configPath = cli.configPath ?? path.resolve(DEFAULT_CONFIG_PATH)
    const configFile = yield* _(loadConfigFile(configPath, cli.configPathExplicit))
    return resolveConfig(cli, configFile)
  })

const render = (handle: Handle, config: ResolvedConfig): Effect.Effect<string, AppError> =>
  fromEither(renderJson(handle, config))

const handleFormat = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const config = yield* _(loadSettings(cli))
    const handle = yield* _(readJsonFile(cli.input, { maxDepth: config.maxDepth }))
    const text = yield* _(render(handle, config))
    const target = cli.write ? cli.input : cli.output
    if (target === undefined) {
      yield* _(emit(text, cli.silent))
    } else {
      yield* _(writeTextFile(target, `${text}\n`))
      yield* _(Effect.logDebug("formatted document written").pipe(Effect.annotateLogs("path", target)))
    }
    return { output: text, exitCode: 0 }
  })

const handleCheck = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const config = yield* _(loadSettings(cli))
    const raw = yield* _(readTextFile(cli.input))
    const handle = yield* _(fromEither(parseJson(raw, { maxDepth: config.maxDepth })))
    const text = yield* _(render(handle, config))
    const canonical = raw === `${text}\n`
    const output = canonical ? `${cli.input}: canonical` : `${cli.input}: not canonical`
    yield* _(emit(output, cli.silent))
    return { output, exitCode: canonical ? 0 : 2 }
  })

const handleGet = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const config = yield* _(loadSettings(cli))
    const root = yield* _(readJsonFile(cli.input, { maxDepth: config.maxDepth }))
    const target = yield* _(fromEither(lookupPath(root, cli.path)))
    const text = yield* _(render(target, config))
    yield* _(emit(text, cli.silent))
    return { output: text, exitCode: 0 }
  })

const executeCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("format", () => handleFormat(cli)),
    Match.when("check", () => handleCheck(cli)),
    Match.when("get", () => handleGet(cli)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, stdout
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(executeCommand(cli))
  })
