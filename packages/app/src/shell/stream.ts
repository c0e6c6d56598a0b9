import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Stream from "effect/Stream"

import type { JsonSyntaxError, JsonWriteError } from "../core/errors.js"
import type { ParseOptions } from "../core/parse.js"
import { parseJson } from "../core/parse.js"
import type { Handle } from "../core/value.js"
import { nullValue } from "../core/value.js"
import type { FormatOptions } from "../core/write.js"
import { renderJson } from "../core/write.js"

// CHANGE: expose load/dump over byte streams
// WHY: any source or sink that speaks Uint8Array chunks can feed the parser and writer
// FORMAT THEOREM: ∀s: load(s) = parse(utf8(concat(s)))
// PURITY: SHELL
// EFFECT: Stream consumption, Effect logger (loadOrNull)
// INVARIANT: load surfaces syntax errors; only loadOrNull masks them to Null
// COMPLEXITY: O(n)

const collectText = <E, R>(input: Stream.Stream<Uint8Array, E, R>): Effect.Effect<string, E, R> =>
  pipe(input, Stream.decodeText(), Stream.mkString)

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(either) ? Effect.fail(either.left) : Effect.succeed(either.right)

/**
 * Read every chunk of `input`, decode it as UTF-8 and parse one JSON document.
 *
 * @pure false
 * @effect consumes the stream
 * @complexity O(n)
 */
export const load = <E, R>(
  input: Stream.Stream<Uint8Array, E, R>,
  options: ParseOptions = {}
): Effect.Effect<Handle, JsonSyntaxError | E, R> =>
  Effect.gen(function*(_) {
    const text = yield* _(collectText(input))
    return yield* _(fromEither(parseJson(text, options)))
  })

/**
 * Like `load`, but a syntax error is logged at Warning level and a Null
 * Handle is returned in its place. Stream failures still propagate.
 */
export const loadOrNull = <E, R>(
  input: Stream.Stream<Uint8Array, E, R>,
  options: ParseOptions = {}
): Effect.Effect<Handle, E, R> =>
  Effect.gen(function*(_) {
    const text = yield* _(collectText(input))
    const parsed = parseJson(text, options)
    if (Either.isRight(parsed)) {
      return parsed.right
    }
    yield* _(Effect.logWarning(parsed.left.message))
    return { value: nullValue() }
  })

/**
 * Canonical text of `handle` as UTF-8 bytes, without a trailing newline.
 * The tree is rendered when the stream runs, so it reflects mutations made
 * after `dump` was called.
 *
 * @complexity O(n)
 */
export const dump = (
  handle: Handle,
  options: FormatOptions = {}
): Stream.Stream<Uint8Array, JsonWriteError> =>
  pipe(
    Stream.fromEffect(Effect.suspend(() => fromEither(renderJson(handle, options)))),
    Stream.encodeText
  )

/** Single-chunk byte stream of `text`, for feeding `load` from memory. */
export const fromText = (text: string): Stream.Stream<Uint8Array> =>
  pipe(Stream.make(text), Stream.encodeText)
