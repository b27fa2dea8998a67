import type { promises as fs, PathLike } from "fs"
import type StructuredData from "../StructuredData.js"

/**
 * Simple contract every data-format adapter must follow. Implementations know
 * how to read from disk and how to parse plain text strings, always returning
 * a StructuredData object on success.
 */
export default interface DataFormat {
  /**
   * Opens the given file (or handle), parses it, and returns StructuredData.
   * File-system errors are passed through untouched.
   */
  loadFile(path: PathLike | fs.FileHandle): Promise<StructuredData>
  /**
   * Parses already-loaded text, skipping any file I/O. Malformed input throws
   * a SyntaxError.
   */
  from(text: string): StructuredData
}
