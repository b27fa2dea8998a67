import { UnsupportedValueError } from "../errors.js"
import { NumberLiteral, type Mapping, type Sequence, type Value } from "../types/value.js"

/**
 * Checks if a value is a sequence
 *
 * @param value - The value to check
 * @returns True if the value is an array of values
 */
export function isSequence(value: Value): value is Sequence {
  return Array.isArray(value)
}

/**
 * Checks if a value is a mapping
 *
 * @param value - The value to check
 * @returns True if the value is a Map of values
 */
export function isMapping(value: Value): value is Mapping {
  return value instanceof Map
}

const describeType = (input: unknown): string => {
  if (typeof input !== "object" || input === null) return typeof input
  const proto: unknown = Object.getPrototypeOf(input)
  if (proto === null) return "object"
  return input.constructor?.name ?? "object"
}

/**
 * Integers that fit a JS number become one; larger ones keep every digit.
 */
export const integerOf = (value: bigint): number | NumberLiteral => {
  const n = Number(value)
  return Number.isSafeInteger(n) ? n : new NumberLiteral(value.toString())
}

/**
 * Floats print as JS prints them, except whole ones, which keep a `.0` so they
 * read as floats (`2.0`, `-0.0`).
 */
export const floatOf = (value: number): number | NumberLiteral => {
  if (!Number.isInteger(value)) return value
  const text = Object.is(value, -0) ? "-0" : String(value)
  return text.includes("e") ? value : new NumberLiteral(`${text}.0`)
}

/**
 * Key of a mapping entry. Scalar keys such as YAML's `1:` or `true:` are
 * stringified; a mapping or sequence used as a key has no symbol form.
 */
export const keyName = (key: unknown, path: string): string => {
  if (typeof key === "object" && key !== null) {
    throw new UnsupportedValueError(path, `${describeType(key)} key`)
  }
  return String(key)
}

const isPlainObject = (input: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(input)
  return proto === Object.prototype || proto === null
}

/**
 * Turns whatever a parser handed back into a document tree. Plain objects and
 * Maps become mappings (see `keyName` for their keys), arrays become sequences,
 * bigints go through `integerOf` and other primitives stay as they are.
 * Anything else (undefined, symbols, Date, class instances) is rejected with
 * the path of the offending node.
 */
export const toValue = (input: unknown, path: string = "$"): Value => {
  if (input === null) return null
  if (typeof input === "string" || typeof input === "number" || typeof input === "boolean") {
    return input
  }
  if (typeof input === "bigint") return integerOf(input)
  if (typeof input !== "object") throw new UnsupportedValueError(path, describeType(input))

  if (input instanceof NumberLiteral) return input

  if (Array.isArray(input)) {
    return input.map((item: unknown, idx) => toValue(item, `${path}[${idx}]`))
  }

  if (input instanceof Map) {
    const mapping = new Map<string, Value>()
    for (const [key, item] of input.entries()) {
      const name = keyName(key, path)
      mapping.set(name, toValue(item, `${path}.${name}`))
    }
    return mapping
  }

  if (isPlainObject(input)) {
    const mapping = new Map<string, Value>()
    for (const [key, item] of Object.entries(input)) {
      mapping.set(key, toValue(item, `${path}.${key}`))
    }
    return mapping
  }

  throw new UnsupportedValueError(path, describeType(input))
}

/**
 * Builds a mapping from a plain object literal. Handy for callers (and tests)
 * that assemble trees by hand.
 */
export const mappingOf = (entries: Record<string, Value>): Mapping => new Map(Object.entries(entries))
