import { z } from "zod"
import {
  type FirstOf,
  type MatchMode,
  matchModes,
  type ParserOptions,
  type ProjectionOptions,
  type ViewOf,
  type ViewResult,
  type ViewShape,
  viewShapes,
} from "../ports/parser"
import type { SettingValue } from "../ports/settings"
import { InvalidParserError, SectionNotFoundError } from "./errors"
import { matchTerm } from "./match"
import { type Entry, projectFirst, projectView } from "./project"

/**
 * The slice of a settings store a parser reads from and writes to.
 */
export interface ParserTarget {
  entries(): Iterable<Entry>
  keys(): Iterable<string>
  set(key: string, value: SettingValue): unknown
}

const parserOptionsSchema = z.object({
  terms: z.array(z.string().min(1, "terms must not be empty strings")).min(1),
  mode: z.optional(z.enum(matchModes)),
  shape: z.optional(z.enum(viewShapes)),
  excise: z.optional(z.boolean()),
  accumulate: z.optional(z.boolean()),
  divider: z.optional(z.string()),
})

/**
 * A reusable, immutable description of a view over a settings store.
 *
 * Reading through a parser always recomputes the view from the store's current
 * contents; nothing is cached.
 */
export class Parser<S extends ViewShape = ViewShape, A extends boolean = boolean> {
  readonly terms: readonly string[]
  readonly mode: MatchMode
  readonly shape: S
  readonly excise: boolean
  readonly accumulate: A
  readonly divider: string

  constructor(options: Required<ParserOptions<S, A>>) {
    this.terms = Object.freeze([...options.terms])
    this.mode = options.mode
    this.shape = options.shape
    this.excise = options.excise
    this.accumulate = options.accumulate
    this.divider = options.divider

    Object.freeze(this)
  }

  apply(this: Parser<S, true>, settings: ParserTarget): ViewOf[S]
  apply(this: Parser<S, false>, settings: ParserTarget): FirstOf[S]
  apply(settings: ParserTarget): ViewOf[S] | FirstOf[S]
  apply(settings: ParserTarget): ViewOf[S] | FirstOf[S] {
    const options = this.projection()

    return this.accumulate
      ? projectView(settings.entries(), options)
      : projectFirst(settings.entries(), options)
  }

  /**
   * Write `value` to the section this parser reads from.
   *
   * The first top-level key matching the terms (unexcised) is replaced
   * wholesale; with no match, a section named after the first term is
   * created.
   *
   * @returns the key that was written
   */
  assign(settings: ParserTarget, value: SettingValue): string {
    const key = this.resolveKey(settings)

    settings.set(key, value)

    return key
  }

  resolveKey(settings: ParserTarget): string {
    for (const key of settings.keys()) {
      if (matchTerm(key, this.terms, { mode: this.mode, excise: false, divider: this.divider })) {
        return key
      }
    }

    const fallback = this.terms[0]
    if (fallback === undefined) throw SectionNotFoundError.forTerms(this.terms)

    return fallback
  }

  private projection(): ProjectionOptions<S> {
    return {
      terms: this.terms,
      mode: this.mode,
      shape: this.shape,
      excise: this.excise,
      accumulate: this.accumulate,
      divider: this.divider,
    }
  }
}

/**
 * Validate parser options, fill in defaults and freeze the result.
 *
 * Defaults: `mode: "exact"`, `shape: "sections"`, `excise: true`,
 * `accumulate: true`, `divider: ""`.
 *
 * @example
 * ```ts
 * const parameters = defineParser({
 *   terms: ["parameters"],
 *   mode: "suffix",
 *   shape: "sections",
 *   divider: "_",
 * })
 *
 * parameters.apply(settings) // { tasks: { start: "when_ready" } }
 * ```
 */
export function defineParser<S extends ViewShape = "sections">(
  options: ParserOptions<S, true>,
): Parser<S, true>
export function defineParser<S extends ViewShape = "sections">(
  options: ParserOptions<S, false> & { accumulate: false },
): Parser<S, false>
export function defineParser<S extends ViewShape = "sections">(
  options: ParserOptions<S, boolean>,
): Parser<S, boolean>
export function defineParser(options: ParserOptions): Parser {
  const result = parserOptionsSchema.safeParse(options)

  if (!result.success) {
    throw new InvalidParserError(`Invalid parser options:\n${z.prettifyError(result.error)}`, {
      code: "invalid_parser",
      context: { terms: options.terms },
    })
  }

  return new Parser({
    terms: options.terms,
    mode: options.mode ?? "exact",
    shape: options.shape ?? "sections",
    excise: options.excise ?? true,
    accumulate: options.accumulate ?? true,
    divider: options.divider ?? "",
  })
}

export type ParserBindings = Readonly<Record<string, Parser>>

/**
 * Property types a store gains from binding `P`.
 */
export type BoundViews<P extends ParserBindings> = {
  -readonly [K in keyof P]: P[K] extends Parser<infer S, infer A> ? ViewResult<S, A> : never
}
