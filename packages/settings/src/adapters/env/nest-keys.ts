import { isMapping } from "../../core/values"

/**
 * Fold flat `SECTION<divider>KEY` variables into sections, splitting on the
 * first divider only. Without a divider the variables stay flat. Undefined
 * values are dropped, and a scalar never replaces a section of the same name.
 */
export function nestKeys(
  flat: Readonly<Record<string, string | undefined>>,
  divider?: string,
): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(flat)) {
    if (value === undefined) continue

    const at = divider ? key.indexOf(divider) : -1

    if (!divider || at <= 0) {
      if (!isMapping(out[key])) out[key] = value
      continue
    }

    const section = key.slice(0, at)
    const inner = key.slice(at + divider.length)
    const existing = out[section]
    const target: Record<string, unknown> = isMapping(existing) ? existing : {}

    target[inner] = value
    out[section] = target
  }

  return out
}
