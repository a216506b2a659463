import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Decoder } from "../../src/core/decoder.js"
import { array, lazy, optional, record, string } from "../../src/core/decoder.js"
import { f64, i32, u8 } from "../../src/core/numbers.js"
import { parse } from "../../src/core/parse.js"
import { missingProperty, parserErr } from "../../src/core/parser-error.js"
import { struct } from "../../src/core/struct.js"
import { value } from "../../src/core/value.js"

const Point = struct({ x: i32, y: i32 })

type Point = Decoder.Type<typeof Point>

interface Node {
  readonly name: string
  readonly children: Array<Node>
}

const NodeDecoder: Decoder<Node> = struct({
  name: string,
  children: array(lazy(() => NodeDecoder))
})

describe("struct", () => {
  it.effect("binds every declared field", () =>
    Effect.sync(() => {
      const parsed = parse(Point, `{"y": -2, "x": 1}`)
      const expected: Point = { x: 1, y: -2 }
      expect(parsed).toEqual(Either.right(expected))
    }))

  it.effect("reports the first missing field at the opening brace", () =>
    Effect.sync(() => {
      expect(parse(Point, `{"y": 2}`)).toEqual(Either.left(parserErr(missingProperty("x"), 1, "{")))
      expect(parse(Point, `\n{"x": 1\n}`)).toEqual(Either.left(parserErr(missingProperty("y"), 2, "{")))
      expect(parse(Point, "{}")).toEqual(Either.left(parserErr(missingProperty("x"), 1, "{")))
    }))

  it.effect("rejects unknown keys at the key token", () =>
    Effect.sync(() => {
      expect(parse(Point, `{"x": 1, "y": 2, "z": 3}`)).toEqual(
        Either.left(parserErr({ _tag: "UnknownProperty" }, 1, `"z"`))
      )
    }))

  it.effect("keeps the last value of a repeated field", () =>
    Effect.sync(() => {
      expect(parse(Point, `{"x": 1, "x": 5, "y": 2}`)).toEqual(Either.right({ x: 5, y: 2 }))
    }))

  it.effect("fails on the first bad field value", () =>
    Effect.sync(() => {
      expect(parse(Point, `{"x": "1", "y": 2}`)).toEqual(
        Either.left(parserErr({ _tag: "UnexpectedToken" }, 1, `"1"`))
      )
      expect(parse(Point, `{"x": 1.5}`)).toEqual(Either.left(parserErr({ _tag: "InvalidNumber" }, 1, "1.5")))
    }))

  it.effect("rejects a trailing comma", () =>
    Effect.sync(() => {
      expect(parse(Point, `{"x": 1, "y": 2,}`)).toEqual(
        Either.left(parserErr({ _tag: "UnexpectedToken" }, 1, ","))
      )
    }))

  it.effect("requires an object", () =>
    Effect.sync(() => {
      expect(parse(Point, "[1, 2]")).toEqual(
        Either.left(parserErr({ _tag: "ExpectedToken", expected: "LBrace" }, 1, "["))
      )
    }))

  it.effect("composes with nested, optional and map fields", () =>
    Effect.sync(() => {
      const Shape = struct({
        label: optional(string),
        origin: Point,
        scale: f64,
        tags: record(u8),
        extra: value
      })
      const parsed = parse(
        Shape,
        `{"label": null, "origin": {"x": 0, "y": 1}, "scale": 2.5, "tags": {"a": 1}, "extra": [true]}`
      )
      expect(parsed).toEqual(
        Either.right({
          label: Option.none(),
          origin: { x: 0, y: 1 },
          scale: 2.5,
          tags: { a: 1 },
          extra: [true]
        })
      )
    }))

  it.effect("decodes recursive records through lazy", () =>
    Effect.sync(() => {
      const parsed = parse(NodeDecoder, `{"name": "root", "children": [{"name": "leaf", "children": []}]}`)
      expect(parsed).toEqual(
        Either.right({ name: "root", children: [{ name: "leaf", children: [] }] })
      )
    }))

  it.effect("accepts an empty record for a struct without fields", () =>
    Effect.sync(() => {
      expect(parse(struct({}), "{}")).toEqual(Either.right({}))
      expect(parse(struct({}), `{"a": 1}`)).toEqual(Either.left(parserErr({ _tag: "UnknownProperty" }, 1, `"a"`)))
    }))
})
