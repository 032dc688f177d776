import fs from "node:fs/promises"
import path from "node:path"
import { pathToFileURL } from "node:url"
import { SourceNotFoundError, SourceParseError } from "../../core/errors"
import { defaultPolicy } from "../../core/policy"
import { isMapping } from "../../core/values"
import type { FileSourceOptions, SettingsSource } from "../../ports/source"
import { errorMessage, isErrnoException } from "../file/file-source"

export type ModuleSourceOptions = FileSourceOptions & {
  /**
   * Export holding the settings mapping. Also looked up on the default
   * export, which is where CommonJS modules put their `exports`.
   *
   * @default "settings"
   */
  attribute?: string
}

export type ModuleSourceDeps = {
  importer?: (url: string) => Promise<unknown>
}

/**
 * Settings exported by a JavaScript module. Module values are already typed,
 * so inference is off by default.
 */
export class ModuleSource implements SettingsSource {
  readonly name: string
  readonly format = "module"
  readonly inferTypes: boolean
  readonly attribute: string
  private readonly importer: (url: string) => Promise<unknown>

  constructor(
    private readonly opts: ModuleSourceOptions,
    deps: ModuleSourceDeps = {},
  ) {
    this.name = `module:${opts.file}`
    this.inferTypes = opts.inferTypes ?? false
    this.attribute = opts.attribute ?? defaultPolicy.moduleAttribute
    this.importer = deps.importer ?? ((url) => import(url))
  }

  get path(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  async load(): Promise<Record<string, unknown>> {
    try {
      await fs.access(this.path)
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        if (!this.opts.required) return {}
        throw SourceNotFoundError.forFile(this.path, err)
      }
      throw SourceParseError.forSource(this.name, errorMessage(err), err)
    }

    let namespace: unknown

    try {
      namespace = await this.importer(pathToFileURL(this.path).href)
    } catch (err) {
      throw SourceParseError.forSource(this.name, errorMessage(err), err)
    }

    const settings = this.pick(namespace)

    if (!isMapping(settings)) {
      throw SourceParseError.forSource(
        this.name,
        `the module has no "${this.attribute}" mapping export`,
      )
    }

    return { ...settings }
  }

  private pick(namespace: unknown): unknown {
    if (typeof namespace !== "object" || namespace === null) return undefined

    const named: unknown = Reflect.get(namespace, this.attribute)
    if (named !== undefined) return named

    const fallback: unknown = Reflect.get(namespace, "default")

    return typeof fallback === "object" && fallback !== null
      ? Reflect.get(fallback, this.attribute)
      : undefined
  }
}
