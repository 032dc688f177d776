import { parse } from "dotenv"
import type { FileSourceOptions } from "../../ports/source"
import { nestKeys } from "../env/nest-keys"
import { FileSource } from "../file/file-source"

export type DotenvSourceOptions = FileSourceOptions & {
  /**
   * Splits variable names into section and key.
   *
   * @example "__" reads `files__test_chunk=500` as `files.test_chunk`
   */
  sectionDivider?: string
}

export class DotenvSource extends FileSource {
  constructor(private readonly dotenvOpts: DotenvSourceOptions) {
    super("dotenv", dotenvOpts, true)
  }

  protected parse(content: string): unknown {
    return nestKeys(parse(content), this.dotenvOpts.sectionDivider)
  }
}
