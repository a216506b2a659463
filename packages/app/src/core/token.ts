// CHANGE: define the token alphabet shared by the scanner and the cursor
// WHY: keep lexical units closed and position-tagged for diagnostics
// QUOTE(TZ): "lexeme always holds the original source slice"
// REF: req-token-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t ∈ Token: source.includes(t.lexeme)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only String tokens carry a decoded value
// COMPLEXITY: O(1)/O(1)

export type TokenKind =
  | "LBrace"
  | "RBrace"
  | "LBracket"
  | "RBracket"
  | "Colon"
  | "Comma"
  | "String"
  | "Number"
  | "Bool"
  | "Null"

export type SymbolKind = Exclude<TokenKind, "String" | "Number" | "Bool" | "Null">

export interface StringToken {
  readonly kind: "String"
  readonly value: string
  readonly line: number
  readonly lexeme: string
}

export interface PlainToken {
  readonly kind: Exclude<TokenKind, "String">
  readonly line: number
  readonly lexeme: string
}

export type Token = StringToken | PlainToken

export const plainToken = (
  kind: Exclude<TokenKind, "String">,
  line: number,
  lexeme: string
): PlainToken => ({ kind, line, lexeme })

export const stringToken = (value: string, line: number, lexeme: string): StringToken => ({
  kind: "String",
  value,
  line,
  lexeme
})

export const isStringToken = (token: Token): token is StringToken => token.kind === "String"

export const symbolKinds: ReadonlyMap<string, SymbolKind> = new Map<string, SymbolKind>([
  ["{", "LBrace"],
  ["}", "RBrace"],
  ["[", "LBracket"],
  ["]", "RBracket"],
  [":", "Colon"],
  [",", "Comma"]
])

export const tokenKindText: Readonly<Record<TokenKind, string>> = {
  LBrace: "'{'",
  RBrace: "'}'",
  LBracket: "'['",
  RBracket: "']'",
  Colon: "':'",
  Comma: "','",
  String: "string",
  Number: "number",
  Bool: "boolean",
  Null: "null"
}
