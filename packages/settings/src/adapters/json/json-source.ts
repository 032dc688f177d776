import type { FileSourceOptions } from "../../ports/source"
import { FileSource } from "../file/file-source"

export class JsonSource extends FileSource {
  constructor(opts: FileSourceOptions) {
    super("json", opts, true)
  }

  protected parse(content: string): unknown {
    return JSON.parse(content)
  }
}
