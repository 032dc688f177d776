import { parse } from "ini"
import type { FileSourceOptions } from "../../ports/source"
import { FileSource } from "../file/file-source"

/**
 * Settings from an INI file. Each `[section]` becomes a section; values are
 * strings (`true`/`false` excepted), so inference is on by default.
 */
export class IniSource extends FileSource {
  constructor(opts: FileSourceOptions) {
    super("ini", opts, true)
  }

  protected parse(content: string): unknown {
    return parse(content)
  }
}
