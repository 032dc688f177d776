import type { Section, SettingValue, SettingsContents } from "../ports/settings"

/**
 * True for plain mappings, including the null-prototype objects some parsers
 * build.
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isSection(value: unknown): value is Section {
  return isMapping(value)
}

export type NormalizeIssue = { path: string; received: string }

/**
 * Convert loader output into setting values.
 *
 * Dates become ISO strings, bigints become numbers, undefined becomes null
 * and null-prototype objects become plain ones. Returns the first value that
 * has no settings equivalent (functions, symbols, class instances) as an
 * issue instead.
 */
export function normalizeContents(
  raw: Record<string, unknown>,
): { ok: true; contents: SettingsContents } | { ok: false; issue: NormalizeIssue } {
  const issues: NormalizeIssue[] = []
  const contents = normalizeMapping(raw, "", issues)
  const issue = issues[0]

  return issue ? { ok: false, issue } : { ok: true, contents }
}

function normalizeMapping(
  raw: Record<string, unknown>,
  path: string,
  issues: NormalizeIssue[],
): Section {
  const out: Section = {}

  for (const [key, value] of Object.entries(raw)) {
    setEntry(out, key, normalizeValue(value, path ? `${path}.${key}` : key, issues))
  }

  return out
}

function normalizeValue(value: unknown, path: string, issues: NormalizeIssue[]): SettingValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return value
    case "bigint":
      return Number(value)
    case "undefined":
      return null
  }

  if (value === null) return null
  if (value instanceof Date) return value.toISOString()
  if (Array.isArray(value)) return value.map((v, i) => normalizeValue(v, `${path}[${i}]`, issues))
  if (isMapping(value)) return normalizeMapping(value, path, issues)

  issues.push({
    path,
    received: typeof value === "object" && value !== null ? value.constructor.name : typeof value,
  })

  return null
}

/**
 * Define `key` as an own data property. Plain assignment of `"__proto__"`
 * would replace the prototype instead.
 */
export function setEntry<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  })
}

/** Read an own property only, never one inherited from the prototype. */
export function ownEntry<V>(source: Record<string, V>, key: string): V | undefined {
  return Object.hasOwn(source, key) ? source[key] : undefined
}

export function cloneContents<T extends SettingValue | SettingsContents>(value: T): T {
  return structuredClone(value)
}
