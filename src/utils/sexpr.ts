import { SEXPR_CONSTANTS } from "../types/value.js"

/**
 * Year, month and day exactly as written in the source text
 */
export interface DateParts {
  year: string
  month: string
  day: string
}

/**
 * Checks if a field name marks a date field
 *
 * @param fieldName - Key the value was found under, if any
 * @param markers - Substrings that mark a date field
 * @returns True if the lower-cased name contains one of the markers
 */
export function isDateField(fieldName: string | undefined, markers: readonly string[]): boolean {
  if (fieldName === undefined) return false
  const name = fieldName.toLowerCase()
  return markers.some((marker) => name.includes(marker.toLowerCase()))
}

/**
 * Splits a `YYYY-MM-DD` string into its components. Leading zeros are kept.
 *
 * @param value - The string to match
 * @returns The components, or null if the string is not shaped like a date
 */
export function matchDate(value: string): DateParts | null {
  const match = SEXPR_CONSTANTS.PATTERNS.DATE.exec(value)
  if (!match) return null
  const [, year, month, day] = match
  return { year, month, day }
}

/**
 * Checks if a string looks like a part number: letters and digits only, with
 * at least one of each (`A4786`, `e1628`, `4x4`)
 *
 * @param value - The string to check
 * @returns True if the string is a part number
 */
export function isPartNumber(value: string): boolean {
  return SEXPR_CONSTANTS.PATTERNS.PART_NUMBER.test(value)
}

/**
 * Wraps a string in double quotes, escaping backslashes and double quotes.
 * Newlines and other control characters pass through untouched.
 *
 * @param value - The raw string
 * @returns The string literal
 */
export function quoteString(value: string): string {
  return `"${value.replace(SEXPR_CONSTANTS.PATTERNS.STRING_ESCAPES, (c) => `\\${c}`)}"`
}

/**
 * Renders a number as an atom. Non-finite values use the Scheme literals.
 *
 * @param value - The number to render
 * @returns The decimal text of the number
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return SEXPR_CONSTANTS.NAN
  if (value === Infinity) return SEXPR_CONSTANTS.POSITIVE_INFINITY
  if (value === -Infinity) return SEXPR_CONSTANTS.NEGATIVE_INFINITY
  return String(value)
}

/**
 * Builds the symbol for a mapping key
 *
 * @param prefix - Namespace prefix, such as `yaml`
 * @param key - The raw key
 * @returns `prefix:key`
 */
export function keySymbol(prefix: string, key: string): string {
  return `${prefix}${SEXPR_CONSTANTS.PREFIX_SEPARATOR}${key}`
}

/**
 * Removes whitespace that sits outside string literals. Two renderings of the
 * same tree compare equal after this.
 *
 * @param text - S-expression text
 * @returns The text without insignificant whitespace
 */
export function stripWhitespace(text: string): string {
  let out = ""
  let inString = false
  for (let i = 0; i < text.length; i++) {
    const c = text[i]
    if (inString) {
      out += c
      if (c === "\\") out += text[++i] ?? ""
      else if (c === "\"") inString = false
    } else if (c === "\"") {
      inString = true
      out += c
    } else if (!/\s/.test(c)) {
      out += c
    }
  }
  return out
}
