import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Cursor } from "./cursor.js"
import { setProperty } from "./json.js"
import type { ParserErr } from "./parser-error.js"
import { unexpectedToken } from "./parser-error.js"
import type { StringToken } from "./token.js"
import { isStringToken } from "./token.js"

// CHANGE: one decoding capability shared by every target type
// WHY: the requested static type selects the grammar, not the token in front of the cursor
// QUOTE(TZ): "parse a value of type T from a cursor"
// REF: req-dispatch-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: Decoder<A>, c: d.decode(c) = Right(a) → a : A ∧ c advanced past one value
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first failure is returned unchanged; nothing is recovered
// COMPLEXITY: O(n) where n = tokens of the decoded value

export interface Decoder<A> {
  readonly decode: (cursor: Cursor) => Either.Either<A, ParserErr>
}

export declare namespace Decoder {
  /** Value type produced by a decoder. */
  export type Type<D> = D extends Decoder<infer A> ? A : never
}

export const makeDecoder = <A>(
  decode: (cursor: Cursor) => Either.Either<A, ParserErr>
): Decoder<A> => ({ decode })

type Closing = "RBracket" | "RBrace"

/**
 * Drive a comma-separated body up to and including its closing token.
 * The opening token is already consumed.
 *
 * @invariant `[1,]` fails at the comma; `[]` succeeds without calling `element`
 */
export const commaSeparated = (
  cursor: Cursor,
  closing: Closing,
  element: () => Either.Either<void, ParserErr>
): Either.Either<void, ParserErr> =>
  Either.gen(function*(_) {
    let hadComma = false
    while (!(yield* _(cursor.check(closing)))) {
      yield* _(element())
      hadComma = yield* _(cursor.check("Comma"))
      if (!hadComma) {
        break
      }
      yield* _(cursor.advance())
    }
    if (hadComma) {
      return yield* _(Either.left(cursor.errorAtPrevious(unexpectedToken)))
    }
    yield* _(cursor.consume(closing))
  })

/**
 * Drive the `"key": value` members of an object whose `{` is already consumed.
 * `member` runs with the key token once the colon is consumed.
 */
export const objectMembers = (
  cursor: Cursor,
  member: (key: StringToken) => Either.Either<void, ParserErr>
): Either.Either<void, ParserErr> =>
  commaSeparated(cursor, "RBrace", () =>
    Either.gen(function*(_) {
      const key = yield* _(cursor.advance())
      if (!isStringToken(key)) {
        return yield* _(Either.left(cursor.errorAtPrevious(unexpectedToken)))
      }
      yield* _(cursor.consume("Colon"))
      yield* _(member(key))
    }))

export const string: Decoder<string> = makeDecoder((cursor) =>
  Either.flatMap(cursor.advance(), (token) =>
    isStringToken(token)
      ? Either.right(token.value)
      : Either.left(cursor.errorAtPrevious(unexpectedToken)))
)

export const boolean: Decoder<boolean> = makeDecoder((cursor) =>
  Either.flatMap(cursor.advance(), (token) =>
    token.kind === "Bool"
      ? Either.right(token.lexeme === "true")
      : Either.left(cursor.errorAtPrevious(unexpectedToken)))
)

/** `null` yields the outermost None; nested optionals never see it. */
export const optional = <A>(item: Decoder<A>): Decoder<Option.Option<A>> =>
  makeDecoder((cursor) =>
    Either.gen(function*(_) {
      if (yield* _(cursor.check("Null"))) {
        yield* _(cursor.advance())
        return Option.none<A>()
      }
      return Option.some(yield* _(item.decode(cursor)))
    })
  )

export const array = <A>(item: Decoder<A>): Decoder<Array<A>> =>
  makeDecoder((cursor) =>
    Either.gen(function*(_) {
      yield* _(cursor.consume("LBracket"))
      const items: Array<A> = []
      yield* _(commaSeparated(cursor, "RBracket", () =>
        Either.map(item.decode(cursor), (decoded) => {
          items.push(decoded)
        })))
      return items
    })
  )

/** String-keyed map; a repeated key keeps the last value. */
export const record = <A>(item: Decoder<A>): Decoder<{ [key: string]: A }> =>
  makeDecoder((cursor) =>
    Either.gen(function*(_) {
      yield* _(cursor.consume("LBrace"))
      const entries: { [key: string]: A } = {}
      yield* _(objectMembers(cursor, (key) =>
        Either.map(item.decode(cursor), (decoded) => {
          setProperty(entries, key.value, decoded)
        })))
      return entries
    })
  )

/** Defers to a decoder that is not yet initialised (forward or recursive references). */
export const lazy = <A>(thunk: () => Decoder<A>): Decoder<A> =>
  makeDecoder((cursor) => thunk().decode(cursor))
