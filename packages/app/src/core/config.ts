import type { CliArgs } from "./cli.js"

// CHANGE: define output settings merging rules and defaults
// WHY: CLI flags override the config file, which overrides the defaults
// QUOTE(TZ): "Precedence: CLI > file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a compact layout always resolves to indent 0
// COMPLEXITY: O(1)/O(1)

export type OutputFormat = "pretty" | "compact"

export interface FileConfig {
  readonly indent?: number
  readonly format?: OutputFormat
  readonly json?: boolean
}

export interface ResolvedConfig {
  readonly indent: number
  readonly json: boolean
}

export const DEFAULT_INDENT = 2

type OutputFlags = Pick<CliArgs, "indent" | "compact" | "json">

const resolveIndent = (cli: OutputFlags, fileConfig: FileConfig | undefined): number => {
  if (cli.compact) {
    return 0
  }
  if (cli.indent !== undefined) {
    return cli.indent
  }
  if (fileConfig?.format === "compact") {
    return 0
  }
  return fileConfig?.indent ?? DEFAULT_INDENT
}

/**
 * Resolve the effective output settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .tyjson.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant indent ≥ 0
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: OutputFlags,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: resolveIndent(cli, fileConfig),
  json: cli.json || fileConfig?.json === true
})
