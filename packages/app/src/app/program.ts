import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import { deriveDecoders } from "../core/derive.js"
import type { AppError } from "../core/errors.js"
import { parseJson } from "../core/parse.js"
import type { ParserErr } from "../core/parser-error.js"
import { formatParserErr, parserErrToJson } from "../core/parser-error.js"
import { render } from "../core/render.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "parse/check/derive"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

const INVALID_DOCUMENT_EXIT_CODE = 2

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitOutput = (result: ProgramResult, silent: boolean): Effect.Effect<void> =>
  silent ? Effect.void : writeStdout(result.output)

const renderDiagnostic = (error: ParserErr, config: ResolvedConfig): string =>
  config.json ? render(parserErrToJson(error)) : formatParserErr(error)

const invalidDocument = (error: ParserErr, config: ResolvedConfig): Effect.Effect<ProgramResult> =>
  Effect.as(
    Effect.logDebug(`document rejected: ${error.kind._tag}`),
    { output: renderDiagnostic(error, config), exitCode: INVALID_DOCUMENT_EXIT_CODE }
  )

const handleParse = (
  source: string,
  config: ResolvedConfig
): Effect.Effect<ProgramResult> =>
  Either.match(parseJson(source), {
    onLeft: (error) => invalidDocument(error, config),
    onRight: (document) => Effect.succeed({ output: render(document, { indent: config.indent }), exitCode: 0 })
  })

const handleCheck = (
  source: string,
  config: ResolvedConfig
): Effect.Effect<ProgramResult> =>
  Either.match(parseJson(source), {
    onLeft: (error) => invalidDocument(error, config),
    onRight: () => Effect.succeed({ output: "ok", exitCode: 0 })
  })

const handleDerive = (
  cli: CliArgs,
  source: string
): Effect.Effect<ProgramResult, AppError, PathService> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const derived = yield* _(fromEither(deriveDecoders(source, path.basename(cli.file))))
    return { output: derived, exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig,
  source: string
): Effect.Effect<ProgramResult, AppError, PathService> =>
  Match.value(cli.command).pipe(
    Match.when("parse", () => handleParse(source, config)),
    Match.when("check", () => handleCheck(source, config)),
    Match.when("derive", () => handleDerive(cli, source)),
    Match.exhaustive
  )

const runCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, configFile)
    yield* _(Effect.logDebug(`resolved config: indent=${config.indent} json=${String(config.json)}`))
    const source = yield* _(readSourceFile(cli.file))
    yield* _(Effect.logDebug(`read ${source.length} characters`))
    const result = yield* _(executeCommand(cli, config, source))
    yield* _(emitOutput(result, cli.silent))
    return result
  }).pipe(
    Effect.annotateLogs({ command: cli.command, file: cli.file }),
    Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the emitted output and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(runCommand(cli))
  })
