import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { array, boolean, optional, record, string } from "../../src/core/decoder.js"
import { u8 } from "../../src/core/numbers.js"
import { parse, parseJson } from "../../src/core/parse.js"
import type { ParserErrKind } from "../../src/core/parser-error.js"
import { formatParserErr, parserErr } from "../../src/core/parser-error.js"

const fails = (kind: ParserErrKind, line: number, lexeme: string) => Either.left(parserErr(kind, line, lexeme))

describe("parseJson", () => {
  it.effect("builds the untyped tree", () =>
    Effect.sync(() => {
      expect(parseJson(`{"a": [1, 2.5, "x", true, null], "b": {}}`)).toEqual(
        Either.right({ a: [1, 2.5, "x", true, null], b: {} })
      )
    }))

  it.effect("accepts scalars at the top level", () =>
    Effect.sync(() => {
      expect(parseJson("  -0.5e1 ")).toEqual(Either.right(-5))
      expect(parseJson(`"hi"`)).toEqual(Either.right("hi"))
      expect(parseJson("null")).toEqual(Either.right(null))
      expect(parseJson("1.")).toEqual(Either.right(1))
    }))

  it.effect("keeps the last value of a repeated key", () =>
    Effect.sync(() => {
      expect(parseJson(`{"a": 1, "a": 2}`)).toEqual(Either.right({ a: 2 }))
    }))

  it.effect("stores __proto__ as an ordinary key", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(parseJson(`{"__proto__": {"polluted": true}}`))
      expect(Object.keys(parsed ?? {})).toEqual(["__proto__"])
      expect(Object.getPrototypeOf(parsed)).toBe(Object.prototype)
    }))

  it.effect("rejects empty input", () =>
    Effect.sync(() => {
      expect(parseJson("")).toEqual(fails({ _tag: "UnexpectedEndOfSource" }, 1, ""))
      expect(parseJson(" \n ")).toEqual(fails({ _tag: "UnexpectedEndOfSource" }, 2, ""))
    }))

  it.effect("rejects trailing tokens", () =>
    Effect.sync(() => {
      expect(parseJson("1 2")).toEqual(fails({ _tag: "ExpectedEndOfSource" }, 1, "2"))
      expect(parseJson("{}\n]")).toEqual(fails({ _tag: "ExpectedEndOfSource" }, 2, "]"))
    }))

  it.effect("rejects trailing commas at the comma", () =>
    Effect.sync(() => {
      expect(parseJson("[1, 2,]")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, ","))
      expect(parseJson(`{"a": 1,\n}`)).toEqual(fails({ _tag: "UnexpectedToken" }, 1, ","))
    }))

  it.effect("reports missing separators at the offending token", () =>
    Effect.sync(() => {
      expect(parseJson("[1 2]")).toEqual(fails({ _tag: "ExpectedToken", expected: "RBracket" }, 1, "2"))
      expect(parseJson(`{"a" 1}`)).toEqual(fails({ _tag: "ExpectedToken", expected: "Colon" }, 1, "1"))
    }))

  it.effect("rejects non-string keys at the key", () =>
    Effect.sync(() => {
      expect(parseJson("{1: 2}")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, "1"))
    }))

  it.effect("rejects tokens that cannot start a value", () =>
    Effect.sync(() => {
      expect(parseJson("]")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, "]"))
      expect(parseJson("[,]")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, ","))
    }))

  it.effect("reports end of input inside a container at the last token", () =>
    Effect.sync(() => {
      expect(parseJson("[")).toEqual(fails({ _tag: "UnexpectedEndOfSource" }, 1, "["))
      expect(parseJson(`{"a":\n`)).toEqual(fails({ _tag: "UnexpectedEndOfSource" }, 1, ":"))
    }))

  it.effect("propagates scanner errors unchanged", () =>
    Effect.sync(() => {
      expect(parseJson("[1, tru]")).toEqual(fails({ _tag: "UnrecognisedLiteral" }, 1, "tru"))
    }))
})

describe("parse with typed decoders", () => {
  it.effect("decodes strings and booleans", () =>
    Effect.sync(() => {
      expect(parse(string, `"a\\nb"`)).toEqual(Either.right("a\nb"))
      expect(parse(boolean, "false")).toEqual(Either.right(false))
      expect(parse(boolean, "null")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, "null"))
      expect(parse(string, "12")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, "12"))
    }))

  it.effect("maps null to None only for optional targets", () =>
    Effect.sync(() => {
      expect(parse(optional(u8), "null")).toEqual(Either.right(Option.none()))
      expect(parse(optional(u8), "7")).toEqual(Either.right(Option.some(7)))
      expect(parse(optional(optional(u8)), "null")).toEqual(Either.right(Option.none()))
      expect(parse(u8, "null")).toEqual(fails({ _tag: "UnexpectedToken" }, 1, "null"))
    }))

  it.effect("decodes homogeneous arrays", () =>
    Effect.sync(() => {
      expect(parse(array(u8), "[]")).toEqual(Either.right([]))
      expect(parse(array(array(u8)), "[[1], [], [2, 3]]")).toEqual(Either.right([[1], [], [2, 3]]))
      expect(parse(array(u8), `[1, "2"]`)).toEqual(fails({ _tag: "UnexpectedToken" }, 1, `"2"`))
      expect(parse(array(u8), "{}")).toEqual(fails({ _tag: "ExpectedToken", expected: "LBracket" }, 1, "{"))
    }))

  it.effect("decodes string-keyed maps", () =>
    Effect.sync(() => {
      expect(parse(record(boolean), `{"x": true, "y": false}`)).toEqual(Either.right({ x: true, y: false }))
      expect(parse(record(u8), `{"x": 300}`)).toEqual(fails({ _tag: "InvalidNumber" }, 1, "300"))
    }))

  it.effect("formats a diagnostic line", () =>
    Effect.sync(() => {
      const error = Either.getOrThrow(Either.flip(parseJson(`{"a" 1}`)))
      expect(formatParserErr(error)).toBe(`Expected ':' at line 1: "1"`)
    }))
})
