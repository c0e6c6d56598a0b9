import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { MAX_DEPTH_LIMIT } from "../core/parse.js"

// CHANGE: decode .jsontree.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing default config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    indentWidth: S.Int.pipe(S.nonNegative()),
    sortKeys: S.Boolean,
    floatFormat: S.Literal("shortest", "fixed"),
    maxDepth: S.Int.pipe(S.between(0, MAX_DEPTH_LIMIT))
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.indentWidth === undefined ? {} : { indentWidth: config.indentWidth }),
      ...(config.sortKeys === undefined ? {} : { sortKeys: config.sortKeys }),
      ...(config.floatFormat === undefined ? {} : { floatFormat: config.floatFormat }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug("config file loaded").pipe(Effect.annotateLogs("path", path)))
    return decoded
  })
