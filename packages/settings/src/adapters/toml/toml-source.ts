import { parse } from "smol-toml"
import type { FileSourceOptions } from "../../ports/source"
import { FileSource } from "../file/file-source"

/**
 * Settings from a TOML file. TOML is typed, so inference is off by default;
 * dates come back as ISO strings once the store normalizes them.
 */
export class TomlSource extends FileSource {
  constructor(opts: FileSourceOptions) {
    super("toml", opts, false)
  }

  protected parse(content: string): unknown {
    return parse(content)
  }
}
