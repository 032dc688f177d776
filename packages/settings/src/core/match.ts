import type { MatchMode, MatchOptions, TermMatch } from "../ports/parser"

type TermMatcher = (item: string, term: string, options: MatchOptions) => TermMatch | undefined

const matchers: Record<MatchMode, TermMatcher> = {
  // Exact matches have nothing left to excise.
  exact: (item, term) => (item === term ? { residual: item, term } : undefined),

  prefix: (item, term, { excise, divider }) => {
    const candidate = term + divider
    if (!item.startsWith(candidate)) return undefined

    return { residual: excise ? item.slice(candidate.length) : item, term }
  },

  suffix: (item, term, { excise, divider }) => {
    const candidate = divider + term
    if (!item.endsWith(candidate)) return undefined

    return { residual: excise ? item.slice(0, item.length - candidate.length) : item, term }
  },
}

/**
 * Match `item` against `terms` in declaration order.
 *
 * The first term that matches wins, not the longest one: callers that want
 * longest-match order their terms longest first.
 *
 * @returns the residual item and the matched term, or undefined
 *
 * @example
 * matchTerm("tasks_parameters", ["parameters"], { mode: "suffix", excise: true, divider: "_" })
 * // { residual: "tasks", term: "parameters" }
 */
export function matchTerm(
  item: string,
  terms: readonly string[],
  options: MatchOptions,
): TermMatch | undefined {
  const matcher = matchers[options.mode]

  for (const term of terms) {
    const match = matcher(item, term, options)
    if (match) return match
  }

  return undefined
}
