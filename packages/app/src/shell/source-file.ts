import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the input document handed to the CLI
// WHY: the parser takes source text; obtaining it is the shell's job
// QUOTE(TZ): "callers are responsible for obtaining the source text"
// REF: req-source-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(s) → s = utf8(contents(p))
// PURITY: SHELL
// EFFECT: Effect<string, AppError, FileSystem>
// INVARIANT: IO failures surface as FileError
// COMPLEXITY: O(n)

export const readSourceFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      return yield* _(Effect.fail(fileError(`File not found: ${path}`)))
    }
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })
