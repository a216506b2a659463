import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { resolveConfig } from "../../src/core/config.js"

const flags = { indent: undefined, compact: false, json: false }

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(flags, undefined)).toEqual({ indent: 2, json: false })
    }))

  it.effect("takes file settings over defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(flags, { indent: 4, json: true })).toEqual({ indent: 4, json: true })
      expect(resolveConfig(flags, { indent: 4, format: "compact" })).toEqual({ indent: 0, json: false })
    }))

  it.effect("takes CLI flags over file settings", () =>
    Effect.sync(() => {
      expect(resolveConfig({ ...flags, indent: 8 }, { indent: 4, format: "compact" })).toEqual({
        indent: 8,
        json: false
      })
      expect(resolveConfig({ ...flags, indent: 8, compact: true }, undefined)).toEqual({ indent: 0, json: false })
      expect(resolveConfig({ ...flags, json: true }, { json: false })).toEqual({ indent: 2, json: true })
    }))
})
