import type { Scalar, SettingValue, SettingsContents } from "../ports/settings"
import { isSection, setEntry } from "./values"

const INTEGER = /^[+-]?\d+(?:_\d+)*$/
const FLOAT = /^[+-]?(?:\d+(?:_\d+)*(?:\.(?:\d+(?:_\d+)*)?)?|\.\d+(?:_\d+)*)(?:e[+-]?\d+(?:_\d+)*)?$/i
const NON_FINITE = /^[+-]?(?:inf|infinity|nan)$/i

const TRUE_WORDS = new Set(["true", "yes"])
const FALSE_WORDS = new Set(["false", "no"])

const LIST_SEPARATOR = ", "

/**
 * Convert a raw string to the scalar it spells.
 *
 * Precedence is fixed: integer, float, boolean word, `", "`-separated list
 * (each piece inferred on its own), then the string itself. Anything that is
 * not a string is returned unchanged, so `inferType(inferType(x))` equals
 * `inferType(x)`. An integer too large to hold exactly stays a string.
 *
 * @example
 * inferType("500")              // 500
 * inferType("yes")              // true
 * inferType("3, 4")             // [3, 4]
 * inferType("%.4f")             // "%.4f"
 */
export function inferType(raw: string): Scalar
export function inferType(raw: SettingValue): SettingValue
export function inferType(raw: SettingValue): SettingValue {
  if (typeof raw !== "string") return raw

  const trimmed = raw.trim()

  if (INTEGER.test(trimmed)) {
    const value = Number(trimmed.replaceAll("_", ""))
    return Number.isSafeInteger(value) ? value : raw
  }
  if (FLOAT.test(trimmed)) return Number(trimmed.replaceAll("_", ""))
  if (NON_FINITE.test(trimmed)) return parseNonFinite(trimmed)

  const lowered = raw.toLowerCase()

  if (TRUE_WORDS.has(lowered)) return true
  if (FALSE_WORDS.has(lowered)) return false

  if (raw.includes(LIST_SEPARATOR)) {
    return raw.split(LIST_SEPARATOR).map((piece) => inferType(piece))
  }

  return raw
}

/**
 * Apply inferType to every string leaf, however deeply sections nest,
 * including the elements of arrays (repeated XML elements, INI `key[]` lists).
 */
export function inferTypes(contents: SettingsContents): SettingsContents {
  const out: SettingsContents = {}

  for (const [key, value] of Object.entries(contents)) {
    setEntry(out, key, inferValue(value))
  }

  return out
}

function inferValue(value: SettingValue): SettingValue {
  if (isSection(value)) return inferTypes(value)
  if (Array.isArray(value)) return value.map(inferValue)

  return inferType(value)
}

function parseNonFinite(value: string): number {
  if (/nan$/i.test(value)) return Number.NaN
  return value.startsWith("-") ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
}
