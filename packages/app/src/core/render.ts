import type { Json } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"

// CHANGE: render an untyped tree back to JSON text
// WHY: the CLI re-emits parsed documents and round trips need a printer
// QUOTE(TZ): "parseJson(render(v)) equals v for every finite tree"
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Json: parseJson(render(v)) = Right(v), including ±Infinity and -0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: indent 0 yields a single line with no insignificant whitespace
// COMPLEXITY: O(n)

export interface RenderOptions {
  readonly indent: number
}

// Overflowing exponents scan back as ±Infinity.
const formatNumber = (value: number): string => {
  if (Number.isNaN(value)) {
    return "null"
  }
  if (value === Number.POSITIVE_INFINITY) {
    return "1e999"
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return "-1e999"
  }
  return Object.is(value, -0) ? "-0" : String(value)
}

const renderContainer = (
  open: string,
  close: string,
  items: ReadonlyArray<string>,
  indent: number,
  depth: number
): string => {
  if (items.length === 0) {
    return `${open}${close}`
  }
  if (indent === 0) {
    return `${open}${items.join(",")}${close}`
  }
  const inner = " ".repeat(indent * (depth + 1))
  const outer = " ".repeat(indent * depth)
  return `${open}\n${inner}${items.join(`,\n${inner}`)}\n${outer}${close}`
}

const renderAt = (value: Json, indent: number, depth: number): string => {
  if (value === null) {
    return "null"
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false"
  }
  if (typeof value === "number") {
    return formatNumber(value)
  }
  if (typeof value === "string") {
    return JSON.stringify(value)
  }
  if (isJsonArray(value)) {
    return renderContainer("[", "]", value.map((item) => renderAt(item, indent, depth + 1)), indent, depth)
  }
  if (isJsonObject(value)) {
    const separator = indent === 0 ? ":" : ": "
    const members = Object.entries(value).map(([key, item]) =>
      `${JSON.stringify(key)}${separator}${renderAt(item, indent, depth + 1)}`
    )
    return renderContainer("{", "}", members, indent, depth)
  }
  return "null"
}

/**
 * Render an untyped tree as JSON text.
 *
 * @param value - Tree to render.
 * @param options - Spaces per nesting level; 0 renders on one line.
 * @returns Text that parseJson reads back to an equal tree.
 *
 * @pure true
 * @invariant strings and keys use only escapes the scanner accepts
 * @complexity O(n)
 */
export const render = (value: Json, options: RenderOptions = { indent: 0 }): string =>
  renderAt(value, Math.max(0, options.indent), 0)
