import { Match } from "effect"
import * as Either from "effect/Either"

import type { Cursor } from "./cursor.js"
import type { Decoder } from "./decoder.js"
import { array, boolean, makeDecoder, record, string } from "./decoder.js"
import type { Json } from "./json.js"
import { f64 } from "./numbers.js"
import type { ParserErr } from "./parser-error.js"
import { unexpectedToken } from "./parser-error.js"

// CHANGE: decode documents with no static target type into the Json tree
// WHY: the dynamic tree reuses the typed decoders instead of a second grammar
// QUOTE(TZ): "branches on the current token's kind"
// REF: req-json-value-2
// SOURCE: n/a
// FORMAT THEOREM: ∀s valid: parse(value, render(v)) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only value-starting tokens are accepted at a value position
// COMPLEXITY: O(n) where n = tokens of the value

const decodeJson = (cursor: Cursor): Either.Either<Json, ParserErr> =>
  Either.flatMap(cursor.peek(), (token): Either.Either<Json, ParserErr> =>
    Match.value(token.kind).pipe(
      Match.when("LBrace", () => jsonObject.decode(cursor)),
      Match.when("LBracket", () => jsonArray.decode(cursor)),
      Match.when("String", () => string.decode(cursor)),
      Match.when("Number", () => f64.decode(cursor)),
      Match.when("Bool", () => boolean.decode(cursor)),
      Match.when("Null", () => Either.map(cursor.advance(), (): Json => null)),
      Match.orElse(() => Either.left(cursor.error(unexpectedToken)))
    ))

export const value: Decoder<Json> = makeDecoder(decodeJson)

const jsonObject = record(value)

const jsonArray = array(value)
