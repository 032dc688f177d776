import { XMLParser } from "fast-xml-parser"
import { SourceParseError } from "../../core/errors"
import { isMapping } from "../../core/values"
import type { FileSourceOptions } from "../../ports/source"
import { FileSource } from "../file/file-source"

export type XmlSourceOptions = FileSourceOptions & {
  /**
   * Expected name of the document element. Its children are the sections
   * either way; naming it turns a mismatch into a parse error.
   *
   * @example "settings" for `<settings><general>...</general></settings>`
   */
  root?: string
}

/**
 * Settings from an XML document. Attributes are ignored and every text node
 * stays a string, so inference is on by default.
 */
export class XmlSource extends FileSource {
  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
  })

  constructor(private readonly xmlOpts: XmlSourceOptions) {
    super("xml", xmlOpts, true)
  }

  protected parse(content: string): unknown {
    const document: unknown = this.parser.parse(content, true)
    const elements = isMapping(document) ? Object.entries(document) : []
    const [element] = elements

    if (elements.length !== 1 || element === undefined) {
      throw SourceParseError.forSource(this.name, "expected a single document element")
    }

    const [name, body] = element
    const { root } = this.xmlOpts

    if (root !== undefined && name !== root) {
      throw SourceParseError.forSource(this.name, `root element <${root}> not found`)
    }

    return body
  }
}
