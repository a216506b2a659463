import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { DeriveError } from "./derive.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): "1 for AppError"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | DeriveError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tagsExhaustive({
      CliError: (e) => `Usage error: ${e.message}`,
      ConfigError: (e) => `Invalid config: ${e.message}`,
      FileError: (e) => `File error: ${e.message}`,
      DeriveError: (e) => `Derive error: ${e.message}`
    })
  )
