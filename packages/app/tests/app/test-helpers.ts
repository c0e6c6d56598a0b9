import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect, Logger } from "effect"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
  /** Write `contents` to `name` inside the temp dir and return its path. */
  readonly fixture: (name: string, contents: string) => Effect.Effect<string, PlatformError>
}

export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.makeTempDirectory())
    const fixture = (name: string, contents: string) => {
      const target = path.join(tempDir, name)
      return fs.writeFileString(target, contents).pipe(Effect.as(target))
    }
    return yield* _(use({ fs, path, tempDir, fixture }))
  })

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))

/**
 * Run `effect` with a logger that records `LEVEL: message` lines.
 */
export const captureLogs = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<readonly [A, ReadonlyArray<string>], E, R> =>
  Effect.suspend(() => {
    const lines: Array<string> = []
    const logger = Logger.make(({ logLevel, message }) => {
      const text = Array.isArray(message) ? message.map(String).join(" ") : String(message)
      lines.push(`${logLevel.label}: ${text}`)
    })
    return effect.pipe(
      Effect.map((value) => [value, lines] as const),
      Effect.provide(Logger.replace(Logger.defaultLogger, logger))
    )
  })
