import type { CliArgs } from "./cli.js"
import { DEFAULT_MAX_DEPTH } from "./parse.js"
import type { FloatFormat, FormatSettings } from "./write.js"
import { defaultFormatSettings } from "./write.js"

// CHANGE: define config merging rules and defaults for parsing and rendering
// WHY: CLI flags override the config file, which overrides defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every resolved field is defined
// COMPLEXITY: O(1)/O(1)

export const DEFAULT_CONFIG_PATH = "./.jsontree.json"

export interface FileConfig {
  readonly indentWidth?: number
  readonly sortKeys?: boolean
  readonly floatFormat?: FloatFormat
  readonly maxDepth?: number
}

export interface ResolvedConfig extends FormatSettings {
  readonly maxDepth: number
}

type ConfigOverrides = Pick<CliArgs, "indentWidth" | "sortKeys" | "floatFormat" | "maxDepth">

/**
 * Resolve the effective settings from CLI flags, file config, and defaults.
 *
 * @param cli - Flags parsed from argv.
 * @param fileConfig - Optional config loaded from .jsontree.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant indentWidth ≥ 0 whenever inputs are
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: ConfigOverrides,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indentWidth: cli.indentWidth ?? fileConfig?.indentWidth ?? defaultFormatSettings.indentWidth,
  sortKeys: cli.sortKeys ?? fileConfig?.sortKeys ?? defaultFormatSettings.sortKeys,
  floatFormat: cli.floatFormat ?? fileConfig?.floatFormat ?? defaultFormatSettings.floatFormat,
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH
})
