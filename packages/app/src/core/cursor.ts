import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ParserErr, ParserErrKind } from "./parser-error.js"
import { expectedToken, ParserBug, parserErr, parserErrAt, unexpectedEndOfSource } from "./parser-error.js"
import type { Scanner } from "./scanner.js"
import { makeScanner } from "./scanner.js"
import type { Token, TokenKind } from "./token.js"

// CHANGE: token cursor with one token of lookahead plus the last consumed token
// WHY: LL(1) grammar needs no backtracking; the previous slot anchors diagnostics
// QUOTE(TZ): "two optional slots updated in lock-step on every advance"
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: advance(): previous' = current ∧ current' = scanner.next()
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: previous is None only before the first advance
// COMPLEXITY: O(1) per primitive plus the scanned token length

export interface Cursor {
  /** Current token, or UnexpectedEndOfSource once the input is exhausted. */
  readonly peek: () => Either.Either<Token, ParserErr>
  /** Compares kinds only: any String token matches a String check. */
  readonly check: (kind: TokenKind) => Either.Either<boolean, ParserErr>
  readonly advance: () => Either.Either<Token, ParserErr>
  readonly consume: (kind: TokenKind) => Either.Either<Token, ParserErr>
  readonly previous: () => Token
  readonly isAtEnd: () => boolean
  /**
   * Anchored at the current token, falling back to the previous one at end of input.
   * Empty input has neither, so the error points at the final line with an empty lexeme.
   */
  readonly error: (kind: ParserErrKind) => ParserErr
  readonly errorAtPrevious: (kind: ParserErrKind) => ParserErr
}

const NO_PREVIOUS = "Called `previous` before advancing - no previous token"
const NO_TOKEN_FOR_ERROR = "No token available to anchor an error"

const cursorFromScanner = (scanner: Scanner, first: Option.Option<Token>): Cursor => {
  let previousToken: Option.Option<Token> = Option.none()
  let currentToken: Option.Option<Token> = first

  const previous = (): Token =>
    Option.getOrElse(previousToken, () => {
      throw new ParserBug(NO_PREVIOUS)
    })

  const errorAtPrevious = (kind: ParserErrKind): ParserErr =>
    Option.match(previousToken, {
      onNone: () => {
        throw new ParserBug(NO_TOKEN_FOR_ERROR)
      },
      onSome: (token) => parserErrAt(kind, token)
    })

  const error = (kind: ParserErrKind): ParserErr =>
    Option.match(Option.orElse(currentToken, () => previousToken), {
      onNone: () => parserErr(kind, scanner.line(), ""),
      onSome: (token) => parserErrAt(kind, token)
    })

  const peek = (): Either.Either<Token, ParserErr> =>
    Either.fromOption(currentToken, () => error(unexpectedEndOfSource))

  const check = (kind: TokenKind): Either.Either<boolean, ParserErr> =>
    Either.map(peek(), (token) => token.kind === kind)

  const advance = (): Either.Either<Token, ParserErr> => {
    const token = peek()
    if (Either.isLeft(token)) {
      return token
    }
    const scanned = scanner.next()
    if (Either.isLeft(scanned)) {
      return Either.left(scanned.left)
    }
    previousToken = Option.some(token.right)
    currentToken = scanned.right
    return token
  }

  const consume = (kind: TokenKind): Either.Either<Token, ParserErr> => {
    const matches = check(kind)
    if (Either.isLeft(matches)) {
      return Either.left(matches.left)
    }
    return matches.right ? advance() : Either.left(error(expectedToken(kind)))
  }

  const isAtEnd = (): boolean => Option.isNone(currentToken)

  return { peek, check, advance, consume, previous, isAtEnd, error, errorAtPrevious }
}

/**
 * Scan the first token and return a cursor positioned on it.
 *
 * @param source - Complete document text.
 * @returns Cursor primed with the first token (None for empty input) or a lexical error.
 *
 * @pure false (the cursor owns a scanner)
 * @invariant current holds the first token before any decoding starts
 * @complexity O(k) where k = length of the first token
 */
export const openCursor = (source: string): Either.Either<Cursor, ParserErr> => {
  const scanner = makeScanner(source)
  return Either.map(scanner.next(), (first) => cursorFromScanner(scanner, first))
}
