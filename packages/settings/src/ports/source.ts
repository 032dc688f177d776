export const sourceFormats = [
  "ini",
  "json",
  "toml",
  "yaml",
  "xml",
  "dotenv",
  "env",
  "module",
  "object",
] as const

export type SourceFormat = (typeof sourceFormats)[number]

/**
 * A source of settings.
 *
 * A SettingsSource only *loads* raw contents. Merging defaults, inferring
 * types and binding parsers happen downstream in Settings.
 */
export interface SettingsSource {
  /**
   * Human-readable name for provenance.
   * Example: "ini:settings.ini", "env", "object"
   */
  readonly name: string

  readonly format: SourceFormat

  /**
   * Whether leaves from this source arrive as untyped strings and should go
   * through type inference unless the caller decides otherwise.
   */
  readonly inferTypes: boolean

  /**
   * Load the raw contents.
   *
   * - The result is always a fresh mapping; callers may mutate it
   * - Format-specific parse failures reject with SourceParseError
   * - A missing required file rejects with SourceNotFoundError
   */
  load(): Promise<Record<string, unknown>>
}

export type FileSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example "settings.ini", "./config/project.toml"
   */
  file: string

  /**
   * - `true`: a missing file rejects with SourceNotFoundError
   * - `false`: a missing file loads as `{}`
   */
  required: boolean

  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Override the format's own inference default.
   */
  inferTypes?: boolean
}
