import { extname } from "path"
import type { OriginFormat } from "../types/value.js"

// Analyzes text content using regex patterns to quickly guess whether it is JSON or YAML
/**
 * Quick helper that guesses the most likely format before we try any parser.
 * The rules focus on obvious signs only, so we do not mislabel data:
 * - Trim surrounding spaces first.
 * - JSON: looks for braces/brackets at both ends.
 * - YAML: looks for `key: value` lines or `- item` style lists.
 * Returns `null` when it cannot confidently pick a format.
 */
export const detectFormat = (text: string): OriginFormat | null => {
  text = text.trim()

  // Check for JSON - starts with { or [ and ends with } or ]
  if (
    (text.startsWith("{") && text.endsWith("}")) ||
    (text.startsWith("[") && text.endsWith("]"))
  ) {
    return "json"
  }
  // Check for YAML - typical YAML patterns
  else if (/^[a-zA-Z0-9_-]+:(\s|$)/m.test(text) || /^\s*-\s+\S/m.test(text) || text.startsWith("---")) {
    return "yaml"
  }
  return null
}

/**
 * Picks a format from a file name's extension (`.json`, `.yaml`, `.yml`, in
 * any letter case). Returns `null` for anything else.
 */
export const formatFromPath = (path: string): OriginFormat | null => {
  switch (extname(path).toLowerCase()) {
    case ".json":
      return "json"
    case ".yaml":
    case ".yml":
      return "yaml"
    default:
      return null
  }
}
