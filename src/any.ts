import StructuredData from "./StructuredData.js"
import type { PathLike } from "fs"
import type { FileHandle } from "fs/promises"
import { ParseError } from "./errors.js"
import json from "./json.js"
import yaml from "./yaml.js"
import type DataFormat from "./types/DataFormat.js"
import type { OriginFormat } from "./types/value.js"
import { detectFormat, formatFromPath } from "./utils/detectFormat.js"
import fs from "fs"

const adapters: Record<OriginFormat, DataFormat> = { json, yaml }

// JSON is tried first: every JSON document is also YAML, but not the other way round
const formats: OriginFormat[] = ["json", "yaml"]

// Facade that tries every supported parser until one succeeds.
// Consumers can hand it arbitrary text or a file path and receive StructuredData.
const any = {
  /**
   * Parses an arbitrary text payload by predicting the format and dispatching
   * to the matching adapter. Falls back to every other adapter, collecting the
   * per-format errors. Returns `null` only when `suppressErrors` is true and
   * all parsers fail.
   */
  from(text: string, suppressErrors: boolean = false): StructuredData | null {
    const predictedFormat = detectFormat(text)
    const order = predictedFormat
      ? [predictedFormat, ...formats.filter((format) => format !== predictedFormat)]
      : formats

    // Capture each error message to build a helpful aggregate exception later.
    const errors: Partial<Record<OriginFormat, string>> = {}
    for (const format of order) {
      try {
        return adapters[format].from(text)
      } catch (e) {
        errors[format] = e instanceof Error ? e.message : String(e)
      }
    }

    if (suppressErrors) return null
    throw new ParseError(
      `Failed to parse data in any supported format: ${JSON.stringify(errors)}`,
      errors,
    )
  },

  /**
   * Reads the file as UTF-8 text. A `.json`, `.yaml` or `.yml` extension picks
   * the adapter directly and its parse error is rethrown with the path
   * attached; any other name goes through `from`. With `suppressErrors`, I/O
   * and parse failures both resolve to `null`.
   */
  async loadFile(
    path: PathLike | FileHandle,
    suppressErrors: boolean = false,
  ): Promise<StructuredData | null> {
    const name = typeof path === "string" ? path : path instanceof URL ? path.pathname : null
    const format = name === null ? null : formatFromPath(name)
    const label = name ?? "input"
    try {
      const content = await fs.promises.readFile(path, "utf8")
      if (format === null) {
        try {
          return this.from(content, suppressErrors)
        } catch (e) {
          if (e instanceof ParseError) throw new ParseError(`${label}: ${e.message}`, e.errors)
          throw e
        }
      }
      try {
        return adapters[format].from(content)
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e)
        throw new ParseError(`Failed to parse ${label} as ${format}: ${message}`, {
          [format]: message,
        })
      }
    } catch (e) {
      // I/O errors (missing files, permission issues) surface here too
      if (suppressErrors) return null
      throw e
    }
  },
}

export default any
