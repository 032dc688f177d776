import YAML from "yaml"
import type { FileSourceOptions } from "../../ports/source"
import { FileSource } from "../file/file-source"

export class YamlSource extends FileSource {
  constructor(opts: FileSourceOptions) {
    super("yaml", opts, false)
  }

  // An empty document parses to null and loads as an empty store.
  protected parse(content: string): unknown {
    return YAML.parse(content) ?? {}
  }
}
