import type { Section, SettingValue } from "./settings"

export const matchModes = ["exact", "prefix", "suffix"] as const

/** How much of an item a term must cover. */
export type MatchMode = (typeof matchModes)[number]

export const viewShapes = [
  "sections",
  "section_contents",
  "contents",
  "keys",
  "kinds",
  "section_keys",
  "section_kinds",
] as const

export type ViewShape = (typeof viewShapes)[number]

/** Shapes computed from section names rather than keys inside sections. */
export type OuterShape = "sections" | "section_contents" | "keys" | "kinds"

export type TermMatch = {
  /** The item, with the matched term and divider removed when excised. */
  residual: string
  term: string
}

export type MatchOptions = {
  mode: MatchMode
  excise: boolean
  divider: string
}

export type ProjectionOptions<S extends ViewShape = ViewShape> = MatchOptions & {
  terms: readonly string[]
  shape: S
  accumulate: boolean
}

/**
 * Full result of each shape, as returned with `accumulate: true`.
 */
export type ViewOf = {
  sections: Record<string, SettingValue>
  section_contents: Section
  contents: Record<string, Section>
  keys: string[]
  kinds: Record<string, string>
  section_keys: Record<string, string[]>
  section_kinds: Record<string, Record<string, string>>
}

/**
 * Result of each shape with `accumulate: false`: the first entry only.
 */
export type FirstOf = {
  sections: SettingValue
  section_contents: Section
  contents: Section
  keys: string
  kinds: string
  section_keys: string[]
  section_kinds: Record<string, string>
}

export type ViewResult<S extends ViewShape, A extends boolean> = A extends true
  ? ViewOf[S]
  : A extends false
    ? FirstOf[S]
    : ViewOf[S] | FirstOf[S]

export type ParserOptions<S extends ViewShape = ViewShape, A extends boolean = boolean> = {
  terms: readonly string[]
  mode?: MatchMode
  shape?: S
  excise?: boolean
  accumulate?: A
  divider?: string
}
