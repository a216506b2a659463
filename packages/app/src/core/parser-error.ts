import { Match } from "effect"

import type { JsonObject } from "./json.js"
import type { Token, TokenKind } from "./token.js"
import { tokenKindText } from "./token.js"

// CHANGE: introduce the parser error algebra returned by every parse stage
// WHY: diagnostics are values; the first failure aborts the parse unchanged
// QUOTE(TZ): "Every error is a value, never an unrecoverable fault"
// REF: req-errors-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParserErr: e.line ≥ 1 ∧ e.kind._tag is exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: equal failures are structurally equal
// COMPLEXITY: O(1)/O(1)

export type ParserErrKind =
  | { readonly _tag: "UnterminatedString" }
  | { readonly _tag: "UnrecognisedSymbol" }
  | { readonly _tag: "UnrecognisedLiteral" }
  | { readonly _tag: "InvalidNumber" }
  | { readonly _tag: "InvalidEscapeSequence" }
  | { readonly _tag: "ExpectedEndOfSource" }
  | { readonly _tag: "ExpectedToken"; readonly expected: TokenKind }
  | { readonly _tag: "UnexpectedToken" }
  | { readonly _tag: "UnknownProperty" }
  | { readonly _tag: "MissingProperty"; readonly field: string }
  | { readonly _tag: "UnexpectedEndOfSource" }

export interface ParserErr {
  readonly _tag: "ParserErr"
  readonly kind: ParserErrKind
  readonly line: number
  readonly lexeme: string
}

export const unterminatedString: ParserErrKind = { _tag: "UnterminatedString" }
export const unrecognisedSymbol: ParserErrKind = { _tag: "UnrecognisedSymbol" }
export const unrecognisedLiteral: ParserErrKind = { _tag: "UnrecognisedLiteral" }
export const invalidNumber: ParserErrKind = { _tag: "InvalidNumber" }
export const invalidEscapeSequence: ParserErrKind = { _tag: "InvalidEscapeSequence" }
export const expectedEndOfSource: ParserErrKind = { _tag: "ExpectedEndOfSource" }
export const unexpectedToken: ParserErrKind = { _tag: "UnexpectedToken" }
export const unknownProperty: ParserErrKind = { _tag: "UnknownProperty" }
export const unexpectedEndOfSource: ParserErrKind = { _tag: "UnexpectedEndOfSource" }

export const expectedToken = (expected: TokenKind): ParserErrKind => ({
  _tag: "ExpectedToken",
  expected
})

export const missingProperty = (field: string): ParserErrKind => ({
  _tag: "MissingProperty",
  field
})

export const parserErr = (kind: ParserErrKind, line: number, lexeme: string): ParserErr => ({
  _tag: "ParserErr",
  kind,
  line,
  lexeme
})

export const parserErrAt = (kind: ParserErrKind, token: Token): ParserErr =>
  parserErr(kind, token.line, token.lexeme)

/**
 * Raised only when the engine breaks one of its own invariants.
 * Input-derived failures are always returned as ParserErr values instead.
 */
export class ParserBug extends Error {
  override readonly name = "ParserBug"

  constructor(message: string) {
    super(`[BUG] ${message}`)
    Object.setPrototypeOf(this, ParserBug.prototype)
  }
}

export const describeParserErrKind = (kind: ParserErrKind): string =>
  Match.value(kind).pipe(
    Match.tagsExhaustive({
      UnterminatedString: () => "Unterminated string",
      UnrecognisedSymbol: () => "Unrecognised symbol",
      UnrecognisedLiteral: () => "Unrecognised literal",
      InvalidNumber: () => "Invalid number",
      InvalidEscapeSequence: () => "Invalid escape sequence",
      ExpectedEndOfSource: () => "Expected end of source",
      ExpectedToken: ({ expected }) => `Expected ${tokenKindText[expected]}`,
      UnexpectedToken: () => "Unexpected token",
      UnknownProperty: () => "Unknown property",
      MissingProperty: ({ field }) => `Missing property ${JSON.stringify(field)}`,
      UnexpectedEndOfSource: () => "Unexpected end of source"
    })
  )

/**
 * Render a diagnostic as a single human-readable line.
 *
 * @pure true
 * @invariant output names the 1-based line and the quoted lexeme
 */
export const formatParserErr = (error: ParserErr): string =>
  `${describeParserErrKind(error.kind)} at line ${error.line}: ${JSON.stringify(error.lexeme)}`

/** Machine-readable diagnostic, as printed by `--json`. */
export const parserErrToJson = (error: ParserErr): JsonObject => ({
  error: error.kind._tag,
  message: describeParserErrKind(error.kind),
  line: error.line,
  lexeme: error.lexeme
})
