import type { SettingsSource } from "../../ports/source"

export type ObjectSourceOptions = {
  /** @default "object" */
  name?: string
  /** @default true */
  inferTypes?: boolean
}

export class ObjectSource implements SettingsSource {
  readonly name: string
  readonly format = "object"
  readonly inferTypes: boolean

  constructor(
    private readonly obj: Readonly<Record<string, unknown>>,
    options: ObjectSourceOptions = {},
  ) {
    this.name = options.name ?? "object"
    this.inferTypes = options.inferTypes ?? true
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
