import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for tyjson
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "Commands (first positional argument, default `parse`)"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "parse" | "check" | "derive"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly indent: number | undefined
  readonly compact: boolean
  readonly json: boolean
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("derive", () => Either.right<CliCommand>("derive")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseIndent = (value: string): Either.Either<number, CliError> => {
  if (!/^[0-9]+$/.test(value)) {
    return Either.left(cliError(`Invalid indent value: ${value}`))
  }
  return Either.right(Number(value))
}

interface DraftArgs {
  readonly positionals: ReadonlyArray<string>
  readonly indent: number | undefined
  readonly compact: boolean
  readonly json: boolean
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

const defaultDraft: DraftArgs = {
  positionals: [],
  indent: undefined,
  compact: false,
  json: false,
  configPath: "./.tyjson.json",
  configPathExplicit: false,
  silent: false,
  verbose: false
}

type ParsedFlag = Either.Either<{ readonly next: DraftArgs; readonly consumed: number }, CliError>

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: DraftArgs, consumed: number): ParsedFlag => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: DraftArgs, value: string) => Either.Either<DraftArgs, CliError>
): ParsedFlag =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const flagParsers: ReadonlyMap<string, FlagParser> = new Map<string, FlagParser>([
  ["compact", (current) => setParsedFlag({ ...current, compact: true }, 1)],
  ["json", (current) => setParsedFlag({ ...current, json: true }, 1)],
  ["silent", (current) => setParsedFlag({ ...current, silent: true }, 1)],
  ["verbose", (current) => setParsedFlag({ ...current, verbose: true }, 1)],
  [
    "indent",
    (current, inlineValue, nextValue) =>
      parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
        Either.map(parseIndent(value), (indent) => ({ ...args, indent })))
  ],
  [
    "config",
    (current, inlineValue, nextValue) =>
      parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
        Either.right({ ...args, configPath: value, configPathExplicit: true }))
  ]
])

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: DraftArgs
): ParsedFlag => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers.get(name)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (rawArgs: ReadonlyArray<string>): Either.Either<DraftArgs, CliError> => {
  let args = defaultDraft
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      args = { ...args, positionals: [...args.positionals, current] }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

interface Target {
  readonly command: CliCommand
  readonly file: string
}

// `tyjson <file>` runs the default command; `tyjson <command> <file>` names it.
// A lone command name is a command without its file.
const resolveTarget = (positionals: ReadonlyArray<string>): Either.Either<Target, CliError> => {
  const [first, second, extra] = positionals
  if (extra !== undefined) {
    return Either.left(cliError(`Unexpected positional argument: ${extra}`))
  }
  if (first === undefined) {
    return Either.left(cliError("Missing file argument"))
  }
  if (second === undefined) {
    return Either.isRight(parseCommand(first))
      ? Either.left(cliError("Missing file argument"))
      : Either.right<Target>({ command: "parse", file: first })
  }
  return Either.map(parseCommand(first), (command) => ({ command, file: second }))
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to parse when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const draftEither = parseFlags(argv.slice(2))
  if (Either.isLeft(draftEither)) {
    return Either.left(draftEither.left)
  }
  const { positionals, ...rest } = draftEither.right
  return Either.map(resolveTarget(positionals), (target) => ({ ...rest, ...target }))
}
