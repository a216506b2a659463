// CHANGE: introduce the untyped JSON tree produced by the dynamic decoder
// WHY: give documents with no static target type a closed, recursive representation
// QUOTE(TZ): "Object, Array, String, Number, Bool, Null"
// REF: req-json-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: x is finite and acyclic (built bottom-up from tokens)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

// Plain assignment would treat "__proto__" as the prototype setter, not as a key.
export const setProperty = (target: object, key: string, value: unknown): void => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}
