import path from "node:path"
import { fileURLToPath } from "node:url"
import { type Logger, NullLogger } from "@strata/logger"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { IniSource } from "../adapters/ini/ini-source"
import { JsonSource } from "../adapters/json/json-source"
import { ModuleSource } from "../adapters/module/module-source"
import { ObjectSource } from "../adapters/object/object-source"
import { TomlSource } from "../adapters/toml/toml-source"
import { XmlSource } from "../adapters/xml/xml-source"
import { YamlSource } from "../adapters/yaml/yaml-source"
import type { SettingValue, SettingsContents } from "../ports/settings"
import type { FileSourceOptions, SettingsSource } from "../ports/source"
import { SourceParseError, SourceTypeError, UnsupportedSourceError } from "./errors"
import { inferTypes } from "./infer"
import { defaultPolicy, type SettingsPolicy } from "./policy"
import { Settings, type SettingsOptions } from "./settings"
import { isMapping, isSection, normalizeContents, ownEntry, setEntry } from "./values"

export type SettingsClass<T extends Settings = Settings> = new (
  contents: SettingsContents,
  options?: SettingsOptions,
) => T

export type LoadSettingsOptions<T extends Settings = Settings> = SettingsOptions & {
  sources: readonly SettingsSource[]
  settingsClass?: SettingsClass<T>
}

export type CreateSettingsOptions<T extends Settings = Settings> = Omit<
  LoadSettingsOptions<T>,
  "sources"
> & {
  /** Base directory for relative paths. */
  cwd?: string
  /** A missing file loads as an empty store instead of failing. */
  optional?: boolean
}

type PathOptions = Pick<CreateSettingsOptions, "cwd" | "optional" | "policy">

type SourceFactory = (opts: FileSourceOptions, policy: SettingsPolicy) => SettingsSource

const sourcesByExtension: Readonly<Record<string, SourceFactory>> = {
  ".ini": (opts) => new IniSource(opts),
  ".cfg": (opts) => new IniSource(opts),
  ".json": (opts) => new JsonSource(opts),
  ".toml": (opts) => new TomlSource(opts),
  ".yaml": (opts) => new YamlSource(opts),
  ".yml": (opts) => new YamlSource(opts),
  ".xml": (opts) => new XmlSource(opts),
  ".env": (opts) => new DotenvSource(opts),
  ".js": (opts, policy) => new ModuleSource({ ...opts, attribute: policy.moduleAttribute }),
  ".mjs": (opts, policy) => new ModuleSource({ ...opts, attribute: policy.moduleAttribute }),
  ".cjs": (opts, policy) => new ModuleSource({ ...opts, attribute: policy.moduleAttribute }),
}

/**
 * Pick the source for a file path by its extension. A bare `.env` file has no
 * extension in the usual sense and is matched by name.
 *
 * @throws UnsupportedSourceError for an unknown extension
 */
export function sourceForPath(
  file: string | URL,
  opts: Omit<FileSourceOptions, "file"> = { required: true },
  policy: SettingsPolicy = defaultPolicy,
): SettingsSource {
  const filePath = file instanceof URL ? fileURLToPath(file) : file
  const base = path.basename(filePath)
  const extension = base.startsWith(".env") ? ".env" : path.extname(filePath).toLowerCase()
  const factory = sourcesByExtension[extension]

  if (!factory) throw UnsupportedSourceError.forExtension(filePath, extension)

  return factory({ ...opts, file: filePath }, policy)
}

/**
 * Build a store from one source.
 *
 * `source` may be a file path (string or URL), a SettingsSource, or a plain
 * mapping.
 *
 * @example
 * ```ts
 * const settings = await createSettings("settings.ini", {
 *   defaults: { general: { verbose: false } },
 * })
 * ```
 */
export async function createSettings<T extends Settings>(
  source: unknown,
  options: CreateSettingsOptions<T> & { settingsClass: SettingsClass<T> },
): Promise<T>
export async function createSettings(
  source: unknown,
  options?: CreateSettingsOptions,
): Promise<Settings>
export async function createSettings(
  source: unknown,
  options: CreateSettingsOptions = {},
): Promise<Settings> {
  const { cwd, optional, ...rest } = options
  const resolved = toSource(source, { cwd, optional, policy: rest.policy })

  return loadSettings({ ...rest, sources: [resolved] })
}

/**
 * Build a store from layered sources, later sources winning key by key
 * within a section.
 *
 * Each source is type-inferred on its own flag unless `options.inferTypes`
 * decides for all of them. Provenance records the last source to touch
 * each section.
 */
export async function loadSettings<T extends Settings>(
  options: LoadSettingsOptions<T> & { settingsClass: SettingsClass<T> },
): Promise<T>
export async function loadSettings(options: LoadSettingsOptions): Promise<Settings>
export async function loadSettings(options: LoadSettingsOptions): Promise<Settings> {
  const { sources, settingsClass, ...settingsOptions } = options
  const logger = (options.logger ?? new NullLogger()).child({ module: "loader" })
  const merged: SettingsContents = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const contents = await loadSource(source, logger)
    const infer = options.inferTypes ?? source.inferTypes
    const typed = infer ? inferTypes(contents) : contents

    for (const [key, value] of Object.entries(typed)) {
      setEntry(merged, key, layer(ownEntry(merged, key), value))
      setEntry(provenance, key, source.name)
    }
  }

  const storeOptions: SettingsOptions = {
    ...settingsOptions,
    // Sources were inferred above; this decides for the defaults.
    inferTypes: options.inferTypes ?? sources.every((s) => s.inferTypes),
    provenance: { ...provenance, ...options.provenance },
  }

  return settingsClass ? new settingsClass(merged, storeOptions) : new Settings(merged, storeOptions)
}

async function loadSource(source: SettingsSource, logger: Logger): Promise<SettingsContents> {
  const raw = await source.load()
  const normalized = normalizeContents(raw)

  if (!normalized.ok) {
    const { path: at, received } = normalized.issue
    throw SourceParseError.forSource(source.name, `unsupported value at "${at}" (${received})`)
  }

  logger.info("Settings source loaded", {
    source: source.name,
    format: source.format,
    sections: Object.keys(normalized.contents).length,
  })

  return normalized.contents
}

function toSource(source: unknown, options: PathOptions): SettingsSource {
  if (typeof source === "string" || source instanceof URL) {
    const required = !options.optional
    const opts = options.cwd === undefined ? { required } : { required, cwd: options.cwd }

    return sourceForPath(source, opts, options.policy ?? defaultPolicy)
  }

  if (isSettingsSource(source)) return source
  if (isMapping(source)) return new ObjectSource(source)

  throw SourceTypeError.of(source)
}

export function isSettingsSource(value: unknown): value is SettingsSource {
  if (typeof value !== "object" || value === null) return false

  return (
    typeof Reflect.get(value, "name") === "string" &&
    typeof Reflect.get(value, "format") === "string" &&
    typeof Reflect.get(value, "inferTypes") === "boolean" &&
    typeof Reflect.get(value, "load") === "function"
  )
}

function layer(base: SettingValue | undefined, next: SettingValue): SettingValue {
  return isSection(base) && isSection(next) ? { ...base, ...next } : next
}
