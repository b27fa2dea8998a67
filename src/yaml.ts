import { promises as fs, type PathLike } from "fs"
import { parseDocument } from "yaml"
import type DataFormat from "./types/DataFormat.js"
import StructuredData from "./StructuredData.js"
import { fromDocument } from "./utils/document.js"

/**
 * YAML adapter backed by the `yaml` package (YAML 1.2 core schema). The tree is
 * read off the parsed nodes, so every key keeps its document position and
 * numbers keep their written precision. Timestamps stay plain strings for the
 * converter's date rule to pick up.
 */
const yaml: DataFormat = {
  /** Reads file contents as UTF-8 text and forwards to `from`. */
  loadFile: async function (path: PathLike | fs.FileHandle): Promise<StructuredData> {
    const text = await fs.readFile(path, "utf8")
    return yaml.from(text)
  },

  /**
   * Parses a single YAML document. An empty document yields null; the first
   * parser error is rethrown as a SyntaxError.
   */
  from: function (text: string): StructuredData {
    const doc = parseDocument(text, { intAsBigInt: true })
    if (doc.errors.length > 0) throw new SyntaxError(doc.errors[0].message)
    return new StructuredData(fromDocument(doc), "yaml")
  },
}

export default yaml
