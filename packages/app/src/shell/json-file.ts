import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Stream from "effect/Stream"

import type { FileError, JsonSyntaxError, JsonWriteError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { ParseOptions } from "../core/parse.js"
import type { Handle } from "../core/value.js"
import type { FormatOptions } from "../core/write.js"
import { renderJson } from "../core/write.js"
import { load } from "./stream.js"

// CHANGE: read and write JSON documents on disk through the stream facade
// WHY: isolate filesystem IO while keeping parse and render errors typed
// FORMAT THEOREM: ∀p,h: write(p,h) then read(p) ≡ h structurally
// PURITY: SHELL
// EFFECT: Effect<Handle | void, JsonSyntaxError | JsonWriteError | FileError, FileSystem>
// INVARIANT: written files end with exactly one newline
// COMPLEXITY: O(n)

const fileBytes = (
  path: string
): Effect.Effect<Stream.Stream<Uint8Array, FileError>, never, FileSystemService> =>
  Effect.map(FileSystem, (fs) =>
    pipe(
      fs.stream(path),
      Stream.mapError((error) => fileError(String(error)))
    ))

/**
 * File contents decoded as UTF-8 with the same decoder `readJsonFile` uses,
 * so a leading byte order mark is dropped on both paths.
 */
export const readTextFile = (
  path: string
): Effect.Effect<string, FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(fileBytes(path))
    return yield* _(pipe(bytes, Stream.decodeText(), Stream.mkString))
  })

export const writeTextFile = (
  path: string,
  payload: string
): Effect.Effect<void, FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, payload).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

export const readJsonFile = (
  path: string,
  options: ParseOptions = {}
): Effect.Effect<Handle, JsonSyntaxError | FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(fileBytes(path))
    return yield* _(load(bytes, options))
  })

export const writeJsonFile = (
  path: string,
  handle: Handle,
  options: FormatOptions = {}
): Effect.Effect<void, JsonWriteError | FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const rendered = renderJson(handle, options)
    if (Either.isLeft(rendered)) {
      return yield* _(Effect.fail(rendered.left))
    }
    yield* _(writeTextFile(path, `${rendered.right}\n`))
  })
