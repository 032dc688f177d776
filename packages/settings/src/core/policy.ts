import { z } from "zod"
import { InvalidPolicyError } from "./errors"

const booleanWords = z.enum(["true", "false", "1", "0", "yes", "no"])

const envBoolean = booleanWords.transform((v) => v === "true" || v === "1" || v === "yes")

const policySchema = z.object({
  globalSection: z.string().min(1),
  overwriteAttributes: z.boolean(),
  missingKeys: z.enum(["raise", "ignore"]),
  moduleAttribute: z.string().min(1),
})

const policyEnvSchema = z.object({
  STRATA_GLOBAL_SECTION: z.optional(z.string().min(1)),
  STRATA_OVERWRITE_ATTRIBUTES: z.optional(envBoolean),
  STRATA_MISSING_KEYS: z.optional(z.enum(["raise", "ignore"])),
  STRATA_MODULE_ATTRIBUTE: z.optional(z.string().min(1)),
})

/**
 * Library-wide behavior shared by every store built with it.
 */
export type SettingsPolicy = Readonly<z.infer<typeof policySchema>>

export const defaultPolicy: SettingsPolicy = Object.freeze({
  globalSection: "general",
  overwriteAttributes: false,
  missingKeys: "raise",
  moduleAttribute: "settings",
})

export type LoadPolicyOptions = {
  env?: Record<string, string | undefined>
  overrides?: Partial<SettingsPolicy>
}

/**
 * Resolve a policy from defaults, then `STRATA_*` environment variables, then
 * explicit overrides.
 *
 * @example
 * ```ts
 * const policy = loadPolicy({ env: process.env, overrides: { missingKeys: "ignore" } })
 * ```
 */
export function loadPolicy({ env = {}, overrides = {} }: LoadPolicyOptions = {}): SettingsPolicy {
  const fromEnv = policyEnvSchema.safeParse(env)

  if (!fromEnv.success) {
    throw new InvalidPolicyError(
      `Settings policy environment is invalid:\n${z.prettifyError(fromEnv.error)}`,
      { code: "invalid_policy", cause: fromEnv.error },
    )
  }

  const vars = fromEnv.data
  const merged = {
    ...defaultPolicy,
    ...(vars.STRATA_GLOBAL_SECTION !== undefined && { globalSection: vars.STRATA_GLOBAL_SECTION }),
    ...(vars.STRATA_OVERWRITE_ATTRIBUTES !== undefined && {
      overwriteAttributes: vars.STRATA_OVERWRITE_ATTRIBUTES,
    }),
    ...(vars.STRATA_MISSING_KEYS !== undefined && { missingKeys: vars.STRATA_MISSING_KEYS }),
    ...(vars.STRATA_MODULE_ATTRIBUTE !== undefined && {
      moduleAttribute: vars.STRATA_MODULE_ATTRIBUTE,
    }),
    ...overrides,
  }

  const result = policySchema.safeParse(merged)

  if (!result.success) {
    throw new InvalidPolicyError(`Settings policy is invalid:\n${z.prettifyError(result.error)}`, {
      code: "invalid_policy",
      cause: result.error,
    })
  }

  return Object.freeze(result.data)
}
