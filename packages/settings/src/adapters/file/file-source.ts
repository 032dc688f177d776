import fs from "node:fs/promises"
import path from "node:path"
import { isSettingsError, SourceNotFoundError, SourceParseError } from "../../core/errors"
import { isMapping } from "../../core/values"
import type { FileSourceOptions, SettingsSource, SourceFormat } from "../../ports/source"

/**
 * Shared read path of the file-backed sources: resolve against `cwd`, read as
 * UTF-8, hand the text to `parse`, and require a mapping at the root.
 */
export abstract class FileSource implements SettingsSource {
  readonly name: string
  readonly inferTypes: boolean

  protected constructor(
    readonly format: SourceFormat,
    protected readonly opts: FileSourceOptions,
    inferByDefault: boolean,
  ) {
    this.name = `${format}:${opts.file}`
    this.inferTypes = opts.inferTypes ?? inferByDefault
  }

  get path(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await this.read()
    if (content === undefined) return {}

    let parsed: unknown

    try {
      parsed = this.parse(content)
    } catch (err) {
      if (isSettingsError(err)) throw err
      throw SourceParseError.forSource(this.name, errorMessage(err), err)
    }

    if (!isMapping(parsed)) {
      throw SourceParseError.forSource(this.name, "the document root is not a mapping")
    }

    return parsed
  }

  protected abstract parse(content: string): unknown

  private async read(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.path, "utf-8")
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        if (!this.opts.required) return undefined
        throw SourceNotFoundError.forFile(this.path, err)
      }

      throw SourceParseError.forSource(this.name, errorMessage(err), err)
    }
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
