import { type Logger, NullLogger } from "@strata/logger"
import type { FirstOf, ViewOf, ViewShape } from "../ports/parser"
import type { Section, SettingValue, SettingsContents } from "../ports/settings"
import {
  AmbiguousSubsetRequestError,
  InvalidParserError,
  InvalidSectionValueError,
  SectionNotFoundError,
  SourceParseError,
  SourceTypeError,
} from "./errors"
import { inferTypes } from "./infer"
import type { BoundViews, Parser, ParserBindings, ParserTarget } from "./parser"
import { defaultPolicy, type SettingsPolicy } from "./policy"
import {
  cloneContents,
  isMapping,
  isSection,
  normalizeContents,
  ownEntry,
  setEntry,
} from "./values"

export type DefaultsMap = Readonly<Record<string, SettingValue>>

export type SettingsOptions = {
  /** Lower-priority contents; loaded values always win over these. */
  defaults?: DefaultsMap
  /** @default true */
  inferTypes?: boolean
  parsers?: ParserBindings
  /** Store name carried in log context. */
  name?: string
  logger?: Logger
  policy?: SettingsPolicy
  /** Section name to the source that supplied it. */
  provenance?: Readonly<Record<string, string>>
  /**
   * Merge class and option defaults under the contents.
   * @default true
   */
  mergeDefaults?: boolean
}

export type InjectOptions = {
  /** Sections to inject besides the one named like `target.name`. */
  sections?: string | readonly string[]
  /** Replace attributes that already hold a truthy value. */
  overwrite?: boolean
  /** Also inject the policy's global section. */
  includeGlobal?: boolean
}

export type SubsetOptions = {
  include?: string | readonly string[]
  exclude?: string | readonly string[]
}

export const DEFAULTS_PROVENANCE = "defaults"
export const RUNTIME_PROVENANCE = "runtime"
export const OBJECT_PROVENANCE = "object"

/**
 * A two-level, insertion-ordered settings store: section name to section
 * contents.
 *
 * Subclasses declare `static defaults` and `static parsers` to bake in
 * defaults and views. Bound views are accessor properties; a subclass that
 * wants them typed declares them with `declare`, so no field initializer
 * shadows the accessor:
 *
 * @example
 * ```ts
 * class ProjectSettings extends Settings {
 *   static override defaults = { general: { verbose: false } }
 *   static override parsers = {
 *     parameters: defineParser({ terms: ["parameters"], mode: "suffix", divider: "_" }),
 *   }
 *
 *   declare parameters: Record<string, SettingValue>
 * }
 * ```
 */
export class Settings implements ParserTarget, Iterable<[string, SettingValue]> {
  static defaults: DefaultsMap = {}
  static parsers: ParserBindings = {}

  readonly name: string
  readonly inferTypes: boolean
  readonly policy: SettingsPolicy

  private readonly species: typeof Settings
  private readonly store: Map<string, SettingValue>
  private readonly origins = new Map<string, string>()
  private readonly bindings = new Map<string, Parser>()
  private readonly logger: Logger

  constructor(contents: Readonly<Record<string, unknown>>, options: SettingsOptions = {}) {
    if (!isMapping(contents)) throw SourceTypeError.of(contents)

    this.name = options.name ?? "settings"
    this.inferTypes = options.inferTypes ?? true
    this.policy = options.policy ?? defaultPolicy
    this.species = new.target
    this.logger = (options.logger ?? new NullLogger()).child({
      module: "settings",
      store: this.name,
    })

    const normalized = normalizeContents(contents)
    if (!normalized.ok) {
      throw SourceParseError.forSource(
        this.name,
        `unsupported value at "${normalized.issue.path}" (${normalized.issue.received})`,
      )
    }

    const defaults =
      options.mergeDefaults === false ? [] : [new.target.defaults, options.defaults ?? {}]
    const merged = mergeUnder(defaults, normalized.contents)
    const typed = this.inferTypes ? inferTypes(merged) : merged

    this.store = new Map(Object.entries(typed))

    for (const key of this.store.keys()) {
      const origin = options.provenance && ownEntry(options.provenance, key)
      const fromDefaults = !Object.hasOwn(normalized.contents, key)

      this.origins.set(key, origin ?? (fromDefaults ? DEFAULTS_PROVENANCE : OBJECT_PROVENANCE))
    }

    for (const [name, parser] of Object.entries({ ...new.target.parsers, ...options.parsers })) {
      this.bind(name, parser)
    }

    this.logger.debug("Settings store built", {
      sections: this.store.size,
      inferred: this.inferTypes,
    })
  }

  /**
   * Build a store where every key maps to its own copy of `value`.
   */
  static fromKeys<T extends Settings>(
    this: new (contents: SettingsContents, options?: SettingsOptions) => T,
    keys: Iterable<string>,
    value: SettingValue,
    options?: SettingsOptions,
  ): T {
    const contents: SettingsContents = {}

    for (const key of keys) {
      setEntry(contents, key, cloneContents(value))
    }

    return new this(contents, options)
  }

  get size(): number {
    return this.store.size
  }

  get(key: string): SettingValue | undefined
  get(key: string, fallback: SettingValue): SettingValue
  get(key: string, fallback?: SettingValue): SettingValue | undefined {
    return this.store.has(key) ? this.store.get(key) : fallback
  }

  has(key: string): boolean {
    return this.store.has(key)
  }

  keys(): IterableIterator<string> {
    return this.store.keys()
  }

  values(): IterableIterator<SettingValue> {
    return this.store.values()
  }

  entries(): IterableIterator<[string, SettingValue]> {
    return this.store.entries()
  }

  items(): [string, SettingValue][] {
    return [...this.store.entries()]
  }

  [Symbol.iterator](): IterableIterator<[string, SettingValue]> {
    return this.store.entries()
  }

  /**
   * @throws SectionNotFoundError when `name` is missing or is not a section
   */
  section(name: string): Section {
    const value = this.store.get(name)
    if (!isSection(value)) throw SectionNotFoundError.forName(name)

    return value
  }

  /**
   * Merge `contents` into an existing section (new keys win), or insert a
   * copy of it as a new section.
   */
  add(section: string, contents: Section): void {
    if (!isSection(contents)) throw InvalidSectionValueError.forSection(section, contents)

    const existing = this.store.get(section)

    if (isSection(existing)) {
      Object.assign(existing, cloneContents(contents))
    } else {
      this.store.set(section, cloneContents(contents))
    }

    this.origins.set(section, RUNTIME_PROVENANCE)
    this.logger.debug("Section added", { section, keys: Object.keys(contents).length })
  }

  /** Replace or create a top-level entry wholesale with a copy of `value`. */
  set(key: string, value: SettingValue): this {
    this.store.set(key, cloneContents(value))
    this.origins.set(key, RUNTIME_PROVENANCE)
    this.logger.debug("Entry set", { section: key })

    return this
  }

  /**
   * @returns whether an entry was removed
   * @throws SectionNotFoundError for a missing key when the policy raises
   */
  delete(key: string): boolean {
    if (!this.store.has(key)) {
      if (this.policy.missingKeys === "raise") throw SectionNotFoundError.forName(key)
      return false
    }

    this.store.delete(key)
    this.origins.delete(key)
    this.logger.debug("Entry deleted", { section: key })

    return true
  }

  /**
   * Copy section keys onto `target` as attributes.
   *
   * Sections read, in order: the one named like `target.name`, then
   * `options.sections`, then the global section when asked. An attribute the
   * target already holds with a truthy value is kept unless `overwrite`.
   */
  inject<T extends object>(target: T, options: InjectOptions = {}): T {
    const overwrite = options.overwrite ?? this.policy.overwriteAttributes
    const names: string[] = []
    const targetName: unknown = Reflect.get(target, "name")

    if (typeof targetName === "string") names.push(targetName)
    names.push(...toList(options.sections))
    if (options.includeGlobal) names.push(this.policy.globalSection)

    for (const name of new Set(names)) {
      const section = this.store.get(name)

      if (!isSection(section)) {
        this.logger.debug("Inject skipped a missing section", { section: name })
        continue
      }

      for (const [key, value] of Object.entries(section)) {
        if (overwrite || !(key in target) || isFalsy(Reflect.get(target, key))) {
          Reflect.set(target, key, value)
        }
      }
    }

    return target
  }

  /**
   * A new store holding `include` (every key when omitted) minus `exclude`.
   *
   * The copy is deep, is built by this store's own class, carries its parsers
   * and provenance, and does not re-merge defaults.
   */
  subset<T extends Settings>(this: T, { include, exclude }: SubsetOptions): T {
    if (include === undefined && exclude === undefined) throw new AmbiguousSubsetRequestError()

    const keys = include === undefined ? [...this.store.keys()] : toList(include)
    const excluded = new Set(toList(exclude))
    const contents: SettingsContents = {}
    const provenance: Record<string, string> = {}

    for (const key of keys) {
      if (excluded.has(key)) continue

      const value = this.store.get(key)
      if (value === undefined) throw SectionNotFoundError.forName(key)

      setEntry(contents, key, cloneContents(value))
      setEntry(provenance, key, this.origins.get(key) ?? OBJECT_PROVENANCE)
    }

    const copy = new this.species(contents, {
      inferTypes: false,
      mergeDefaults: false,
      parsers: Object.fromEntries(this.bindings),
      name: this.name,
      logger: this.logger,
      policy: this.policy,
      provenance,
    })

    if (!isSameKind(copy, this)) {
      throw new TypeError(`${this.species.name} built a store of another class`)
    }

    return copy
  }

  toObject(): SettingsContents {
    return cloneContents(Object.fromEntries(this.store))
  }

  toJSON(): SettingsContents {
    return this.toObject()
  }

  /**
   * Which source supplied `section`: "defaults", a source name, or "runtime"
   * for sections written after construction.
   */
  explain(section: string): string {
    const origin = this.origins.get(section)
    if (origin === undefined) throw SectionNotFoundError.forName(section)

    return origin
  }

  sourcesUsed(): string[] {
    return [...new Set(this.origins.values())]
  }

  /** Apply a parser that is not bound to this store. */
  parse<S extends ViewShape>(parser: Parser<S, true>): ViewOf[S]
  parse<S extends ViewShape>(parser: Parser<S, false>): FirstOf[S]
  parse<S extends ViewShape>(parser: Parser<S, boolean>): ViewOf[S] | FirstOf[S]
  parse(parser: Parser): ViewOf[ViewShape] | FirstOf[ViewShape] {
    return parser.apply(this)
  }

  /**
   * Expose `parser` as the accessor property `name`: reads apply the parser,
   * writes assign through it.
   *
   * @throws InvalidParserError when `name` is already a member of the store
   */
  bind(name: string, parser: Parser): void {
    if (name in this) {
      throw new InvalidParserError(`parser "${name}" collides with an existing member`, {
        code: "invalid_parser",
        context: { parser: name },
      })
    }

    Object.defineProperty(this, name, {
      configurable: true,
      enumerable: false,
      get: () => parser.apply(this),
      set: (value: SettingValue) => {
        parser.assign(this, value)
      },
    })

    this.bindings.set(name, parser)
    this.logger.debug("Parser bound", { parser: name, shape: parser.shape })
  }

  boundParser(name: string): Parser | undefined {
    return this.bindings.get(name)
  }

  /** Read the bound view `name`. */
  view(name: string): ViewOf[ViewShape] | FirstOf[ViewShape] {
    return this.requireParser(name).apply(this)
  }

  /**
   * Write through the bound parser `name`.
   *
   * @returns the top-level key that was written
   */
  assign(name: string, value: SettingValue): string {
    return this.requireParser(name).assign(this, value)
  }

  private requireParser(name: string): Parser {
    const parser = this.bindings.get(name)

    if (!parser) {
      throw new InvalidParserError(`no parser is bound as "${name}"`, {
        code: "invalid_parser",
        context: { parser: name },
      })
    }

    return parser
  }
}

/**
 * Narrow a store to the typed views of `parsers` once every one of them is
 * bound to it.
 */
export function hasBoundViews<T extends Settings, P extends ParserBindings>(
  settings: T,
  parsers: P,
): settings is T & BoundViews<P> {
  return Object.entries(parsers).every(([name, parser]) => settings.boundParser(name) === parser)
}

/**
 * Merge `contents` over each defaults layer in turn. A section present on both
 * sides is merged key by key; anything else is replaced.
 */
function mergeUnder(layers: readonly DefaultsMap[], contents: SettingsContents): SettingsContents {
  const out: SettingsContents = {}

  for (const layer of [...layers, contents]) {
    for (const [key, value] of Object.entries(layer)) {
      const base = ownEntry(out, key)
      const copy = cloneContents(value)

      setEntry(out, key, isSection(base) && isSection(copy) ? { ...base, ...copy } : copy)
    }
  }

  return out
}

function isSameKind<T extends Settings>(copy: Settings, original: T): copy is T {
  return copy.constructor === original.constructor
}

function toList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return []
  return typeof value === "string" ? [value] : [...value]
}

function isFalsy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0
  if (isMapping(value)) return Object.keys(value).length === 0
  return !value
}
