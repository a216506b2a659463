import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { f32, f64, i128, i16, i32, i64, i8, u128, u16, u32, u64, u8 } from "../../src/core/numbers.js"
import { parse } from "../../src/core/parse.js"
import { parserErr } from "../../src/core/parser-error.js"

const invalid = (lexeme: string) => Either.left(parserErr({ _tag: "InvalidNumber" }, 1, lexeme))

describe("integer decoders", () => {
  it.effect("accept the bounds of each width", () =>
    Effect.sync(() => {
      expect(parse(i8, "-128")).toEqual(Either.right(-128))
      expect(parse(i8, "127")).toEqual(Either.right(127))
      expect(parse(i16, "-32768")).toEqual(Either.right(-32768))
      expect(parse(i32, "2147483647")).toEqual(Either.right(2147483647))
      expect(parse(u8, "255")).toEqual(Either.right(255))
      expect(parse(u16, "65535")).toEqual(Either.right(65535))
      expect(parse(u32, "4294967295")).toEqual(Either.right(4294967295))
    }))

  it.effect("reject values outside the width", () =>
    Effect.sync(() => {
      expect(parse(i8, "128")).toEqual(invalid("128"))
      expect(parse(i8, "-129")).toEqual(invalid("-129"))
      expect(parse(u8, "256")).toEqual(invalid("256"))
      expect(parse(u32, "4294967296")).toEqual(invalid("4294967296"))
    }))

  it.effect("decode 64 and 128 bit widths to bigint without losing precision", () =>
    Effect.sync(() => {
      expect(parse(i64, "-9223372036854775808")).toEqual(Either.right(-9223372036854775808n))
      expect(parse(u64, "18446744073709551615")).toEqual(Either.right(18446744073709551615n))
      expect(parse(u64, "18446744073709551616")).toEqual(invalid("18446744073709551616"))
      expect(parse(i128, "170141183460469231731687303715884105727")).toEqual(
        Either.right(170141183460469231731687303715884105727n)
      )
      expect(parse(u128, "340282366920938463463374607431768211456")).toEqual(
        invalid("340282366920938463463374607431768211456")
      )
    }))

  it.effect("reject fractions and exponents", () =>
    Effect.sync(() => {
      expect(parse(i32, "1.0")).toEqual(invalid("1.0"))
      expect(parse(i32, "1e3")).toEqual(invalid("1e3"))
      expect(parse(i64, "2.")).toEqual(invalid("2."))
    }))

  it.effect("reject any sign on unsigned targets", () =>
    Effect.sync(() => {
      expect(parse(u8, "-0")).toEqual(invalid("-0"))
      expect(parse(u64, "-1")).toEqual(invalid("-1"))
      expect(parse(i8, "-0")).toEqual(Either.right(0))
    }))

  it.effect("accept leading zeros", () =>
    Effect.sync(() => {
      expect(parse(u16, "007")).toEqual(Either.right(7))
    }))

  it.effect("reject non-number tokens as unexpected", () =>
    Effect.sync(() => {
      expect(parse(i32, `"1"`)).toEqual(Either.left(parserErr({ _tag: "UnexpectedToken" }, 1, `"1"`)))
    }))
})

describe("float decoders", () => {
  it.effect("parse decimal and exponent forms", () =>
    Effect.sync(() => {
      expect(parse(f64, "3.25")).toEqual(Either.right(3.25))
      expect(parse(f64, "-1.5E2")).toEqual(Either.right(-150))
      expect(parse(f64, "1.")).toEqual(Either.right(1))
      expect(parse(f64, "42")).toEqual(Either.right(42))
    }))

  it.effect("overflow to infinity", () =>
    Effect.sync(() => {
      expect(parse(f64, "1e400")).toEqual(Either.right(Number.POSITIVE_INFINITY))
      expect(parse(f32, "-1e39")).toEqual(Either.right(Number.NEGATIVE_INFINITY))
    }))

  it.effect("round single precision values", () =>
    Effect.sync(() => {
      expect(parse(f32, "0.1")).toEqual(Either.right(Math.fround(0.1)))
      expect(parse(f32, "0.5")).toEqual(Either.right(0.5))
    }))
})
