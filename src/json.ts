import { promises as fs, type PathLike } from "fs"
import { parseDocument } from "yaml"
import type DataFormat from "./types/DataFormat.js"
import StructuredData from "./StructuredData.js"
import { fromDocument } from "./utils/document.js"
import { toValue } from "./utils/value.js"

/**
 * Minimal JSON adapter. `JSON.parse` decides what is valid JSON; the tree is
 * then read with the `yaml` package's JSON schema, which keeps integer-like
 * keys in document order and numbers as written (`2.0`, integers past 2^53).
 * Duplicate keys behave as in `JSON.parse`: the last value wins, in the first
 * key's position.
 */
const json: DataFormat = {
  /** Reads file contents as UTF-8 text and forwards to `from`. */
  loadFile: async function (path: PathLike | fs.FileHandle): Promise<StructuredData> {
    const text = await fs.readFile(path, "utf8")
    return json.from(text)
  },

  /** Parses in-memory JSON text into StructuredData. */
  from: function (text: string): StructuredData {
    const parsed: unknown = JSON.parse(text)
    const doc = parseDocument(text, { schema: "json", intAsBigInt: true, uniqueKeys: false })
    // valid JSON the yaml reader still rejects falls back to the JSON.parse tree
    const value = doc.errors.length === 0 ? fromDocument(doc) : toValue(parsed)
    return new StructuredData(value, "json")
  },
}

export default json
