/**
 * A number kept as its decimal text, for values a JS number cannot print as
 * written: whole floats such as `2.0` and integers past 2^53.
 */
export class NumberLiteral {
  constructor(readonly text: string) {}
}

/**
 * Leaf values a parsed document can hold: strings, numbers, booleans and null
 */
export type Scalar = string | number | NumberLiteral | boolean | null

/**
 * Keyed collection of values. A Map keeps the document's key order, which a
 * plain object does not guarantee for integer-like keys.
 */
export type Mapping = ReadonlyMap<string, Value>

/**
 * Ordered list of values
 */
export type Sequence = readonly Value[]

/**
 * Any node of a parsed document tree
 */
export type Value = Scalar | Sequence | Mapping

/**
 * Formats the library can read
 */
export type OriginFormat = "json" | "yaml"

/**
 * Constants of the S-expression schema
 */
export const SEXPR_CONSTANTS = {
  /** Separator between namespace prefix and key */
  PREFIX_SEPARATOR: ":",

  /** Head of the date constructor call */
  DATE_CONSTRUCTOR: "make-date",

  /** Atoms for booleans and null */
  TRUE: "#t",
  FALSE: "#f",
  NIL: "nil",

  /** Prefix of a quoted symbol */
  QUOTE: "'",

  /** Scheme literals for non-finite numbers */
  POSITIVE_INFINITY: "+inf.0",
  NEGATIVE_INFINITY: "-inf.0",
  NAN: "+nan.0",

  /** Default pretty-print indentation */
  INDENT_SIZE: 2,

  /** Field-name substrings enabling the date rule */
  DATE_MARKERS: ["date"] as const,

  PATTERNS: {
    /** Four-digit year, two-digit month and day, hyphen separated */
    DATE: /^([0-9]{4})-([0-9]{2})-([0-9]{2})$/,

    /** Letters and digits only, with at least one of each */
    PART_NUMBER: /^(?=[A-Za-z0-9]*[A-Za-z])(?=[A-Za-z0-9]*[0-9])[A-Za-z0-9]+$/,

    /** Characters escaped inside string literals */
    STRING_ESCAPES: /[\\"]/g,
  },
} as const
