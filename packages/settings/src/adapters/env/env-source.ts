import type { SettingsSource } from "../../ports/source"
import { nestKeys } from "./nest-keys"

export type EnvSourceOptions = {
  /** Only variables starting with this are read; the prefix is stripped. */
  prefix?: string
  /** Splits `GENERAL__VERBOSE` into section `GENERAL`, key `VERBOSE`. */
  sectionDivider?: string
  env?: Record<string, string | undefined>
  inferTypes?: boolean
}

export class EnvSource implements SettingsSource {
  readonly name = "env"
  readonly format = "env"
  readonly inferTypes: boolean
  private readonly prefix?: string | undefined
  private readonly sectionDivider?: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.sectionDivider = options.sectionDivider
    this.env = options.env ?? process.env
    this.inferTypes = options.inferTypes ?? true
  }

  async load(): Promise<Record<string, unknown>> {
    if (!this.prefix) return nestKeys(this.env, this.sectionDivider)

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return nestKeys(filtered, this.sectionDivider)
  }
}
