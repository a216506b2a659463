import * as Either from "effect/Either"

import { openCursor } from "./cursor.js"
import type { Decoder } from "./decoder.js"
import type { Json } from "./json.js"
import type { ParserErr } from "./parser-error.js"
import { expectedEndOfSource } from "./parser-error.js"
import { value } from "./value.js"

// CHANGE: single parse entrypoint over any decoder
// WHY: the whole input must be exactly one well-formed value of the requested type
// QUOTE(TZ): "any leftover token is ExpectedEndOfSource"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d, s: parse(d, s) = Right(a) → tokens(s) are all consumed by d
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each call owns an independent scanner and cursor
// COMPLEXITY: O(n) where n = source length

/**
 * Parse a complete document with the given decoder.
 *
 * @param decoder - Target type token, e.g. `value`, `u32`, `array(string)`, `struct({...})`.
 * @param source - Complete document text.
 * @returns Either with the decoded value or the first ParserErr encountered.
 *
 * @pure true
 * @invariant no partial result is returned on failure
 * @complexity O(n)
 */
export const parse = <A>(decoder: Decoder<A>, source: string): Either.Either<A, ParserErr> =>
  Either.gen(function*(_) {
    const cursor = yield* _(openCursor(source))
    const decoded = yield* _(decoder.decode(cursor))
    if (!cursor.isAtEnd()) {
      return yield* _(Either.left(cursor.error(expectedEndOfSource)))
    }
    return decoded
  })

export const parseJson = (source: string): Either.Either<Json, ParserErr> => parse(value, source)
