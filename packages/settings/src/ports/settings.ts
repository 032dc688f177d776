/** A value type inference can produce from a string. */
export type Scalar = string | number | boolean | Scalar[]

export type SettingValue = string | number | boolean | null | SettingValue[] | Section

/**
 * A named group of settings. Keys keep insertion order, except that
 * integer-like keys sort first as they do in every JavaScript object.
 */
export interface Section {
  [key: string]: SettingValue
}

/** Loaded contents: section name (or top-level key) to value. */
export type SettingsContents = Record<string, SettingValue>
