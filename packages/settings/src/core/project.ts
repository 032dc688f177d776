import type {
  FirstOf,
  OuterShape,
  ProjectionOptions,
  TermMatch,
  ViewOf,
  ViewShape,
} from "../ports/parser"
import type { Section, SettingValue } from "../ports/settings"
import { KeyNotFoundError, SectionNotFoundError } from "./errors"
import { matchTerm } from "./match"
import { isSection, setEntry } from "./values"

export type Entry = readonly [name: string, value: SettingValue]

type Matcher = (item: string) => TermMatch | undefined

type Collectors = {
  [K in ViewShape]: (entries: readonly Entry[], match: Matcher) => ViewOf[K]
}

type FirstPickers = {
  [K in ViewShape]: (entries: readonly Entry[], match: Matcher) => FirstOf[K] | undefined
}

const outerShapes: Record<OuterShape, true> = {
  sections: true,
  section_contents: true,
  keys: true,
  kinds: true,
}

const collectors: Collectors = {
  sections: (entries, match) => {
    const out: Record<string, SettingValue> = {}

    for (const [name, value] of entries) {
      const m = match(name)
      if (m) setEntry(out, m.residual, value)
    }

    return out
  },

  // Later sections overwrite earlier ones on key collisions.
  section_contents: (entries, match) => {
    const out: Section = {}

    for (const [name, value] of entries) {
      if (isSection(value) && match(name)) Object.assign(out, value)
    }

    return out
  },

  contents: (entries, match) => perSection(entries, (section) => matchingContents(section, match)),

  keys: (entries, match) => {
    const out: string[] = []

    for (const [name] of entries) {
      const m = match(name)
      if (m) out.push(m.residual)
    }

    return out
  },

  kinds: (entries, match) => {
    const out: Record<string, string> = {}

    for (const [name] of entries) {
      const m = match(name)
      if (m) setEntry(out, m.residual, m.term)
    }

    return out
  },

  section_keys: (entries, match) =>
    perSection(entries, (section) => matchingKeys(section, match)),

  section_kinds: (entries, match) =>
    perSection(entries, (section) => matchingKinds(section, match)),
}

const firstPickers: FirstPickers = {
  sections: (entries, match) => entries.find(([name]) => match(name))?.[1],

  section_contents: (entries, match) => {
    for (const [name, value] of entries) {
      if (isSection(value) && match(name)) return value
    }
    return undefined
  },

  contents: (entries, match) => firstInSections(entries, (s) => matchingContents(s, match)),

  keys: (entries, match) => {
    for (const [name] of entries) {
      const m = match(name)
      if (m) return m.residual
    }
    return undefined
  },

  kinds: (entries, match) => {
    for (const [name] of entries) {
      const m = match(name)
      if (m) return m.term
    }
    return undefined
  },

  section_keys: (entries, match) => firstInSections(entries, (s) => matchingKeys(s, match)),

  section_kinds: (entries, match) => firstInSections(entries, (s) => matchingKinds(s, match)),
}

/**
 * Compute the full view of `entries` for `options.shape`.
 *
 * Nothing matching yields an empty list for `keys` and an empty mapping for
 * every other shape.
 */
export function projectView<S extends ViewShape>(
  entries: Iterable<Entry>,
  options: ProjectionOptions<S>,
): ViewOf[S] {
  return collectors[options.shape]([...entries], matcherFor(options))
}

/**
 * Compute only the first entry of the view, in store order.
 *
 * For `section_contents` that is the contents of the first matching section.
 *
 * @throws SectionNotFoundError when no section name matches (outer shapes)
 * @throws KeyNotFoundError when no key inside any section matches
 */
export function projectFirst<S extends ViewShape>(
  entries: Iterable<Entry>,
  options: ProjectionOptions<S>,
): FirstOf[S] {
  const first = firstPickers[options.shape]([...entries], matcherFor(options))

  if (first === undefined) {
    throw isOuterShape(options.shape)
      ? SectionNotFoundError.forTerms(options.terms)
      : KeyNotFoundError.forTerms(options.terms)
  }

  return first
}

export function isOuterShape(shape: ViewShape): shape is OuterShape {
  return shape in outerShapes
}

function matcherFor(options: ProjectionOptions): Matcher {
  const { terms, mode, excise, divider } = options

  return (item) => matchTerm(item, terms, { mode, excise, divider })
}

function sectionEntries(entries: readonly Entry[]): [string, Section][] {
  const out: [string, Section][] = []

  for (const [name, value] of entries) {
    if (isSection(value)) out.push([name, value])
  }

  return out
}

function perSection<T>(
  entries: readonly Entry[],
  pick: (section: Section) => T | undefined,
): Record<string, T> {
  const out: Record<string, T> = {}

  for (const [name, section] of sectionEntries(entries)) {
    const picked = pick(section)
    if (picked !== undefined) setEntry(out, name, picked)
  }

  return out
}

function firstInSections<T>(
  entries: readonly Entry[],
  pick: (section: Section) => T | undefined,
): T | undefined {
  for (const [, section] of sectionEntries(entries)) {
    const picked = pick(section)
    if (picked !== undefined) return picked
  }

  return undefined
}

function matchingContents(section: Section, match: Matcher): Section | undefined {
  const out: Section = {}
  let found = false

  for (const [key, value] of Object.entries(section)) {
    const m = match(key)
    if (!m) continue

    setEntry(out, m.residual, value)
    found = true
  }

  return found ? out : undefined
}

function matchingKeys(section: Section, match: Matcher): string[] | undefined {
  const keys = collectors.keys(Object.entries(section), match)

  return keys.length > 0 ? keys : undefined
}

function matchingKinds(section: Section, match: Matcher): Record<string, string> | undefined {
  const kinds = collectors.kinds(Object.entries(section), match)

  return Object.keys(kinds).length > 0 ? kinds : undefined
}
