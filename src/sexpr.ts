import { UnsupportedValueError } from "./errors.js"
import { type ConvertOptionsInput, resolveConvertOptions } from "./options.js"
import { NumberLiteral, SEXPR_CONSTANTS, type Value } from "./types/value.js"
import {
  formatNumber,
  isDateField,
  isPartNumber,
  keySymbol,
  matchDate,
  quoteString,
} from "./utils/sexpr.js"
import { isMapping, isSequence } from "./utils/value.js"

/**
 * Decides how the children of a list are laid out. Both layouts emit the same
 * tokens in the same order and differ only in whitespace.
 */
interface Layout {
  list(children: string[], depth: number): string
}

const compactLayout: Layout = {
  list: (children) => `(${children.join(" ")})`,
}

// one child per line, closing paren back at the parent's indent
const indentedLayout = (size: number): Layout => {
  const pad = (level: number) => " ".repeat(level * size)
  return {
    list: (children, depth) => {
      if (children.length === 0) return "()"
      const body = children.map((child) => `\n${pad(depth + 1)}${child}`).join("")
      return `(${body}\n${pad(depth)})`
    },
  }
}

interface Settings {
  prefix: string
  layout: Layout
  dateMarkers: readonly string[]
}

/**
 * Where the walk currently is. `fieldName` is the key of the nearest enclosing
 * mapping entry; sequence elements inherit their sequence's field name so that
 * a `dates:` list still gets the date rule.
 */
interface Context {
  fieldName?: string
  depth: number
  path: string
}

const renderDate = (value: string, ctx: Context, settings: Settings): string | null => {
  if (!isDateField(ctx.fieldName, settings.dateMarkers)) return null
  const parts = matchDate(value)
  if (!parts) return null
  return `(${SEXPR_CONSTANTS.DATE_CONSTRUCTOR} ${parts.year} ${parts.month} ${parts.day})`
}

const renderString = (value: string, ctx: Context, settings: Settings): string => {
  const date = renderDate(value, ctx, settings)
  if (date !== null) return date
  if (isPartNumber(value)) return `${SEXPR_CONSTANTS.QUOTE}${value}`
  return quoteString(value)
}

const render = (value: Value, ctx: Context, settings: Settings): string => {
  const { layout, prefix } = settings
  const depth = ctx.depth + 1

  if (isMapping(value)) {
    const pairs: string[] = []
    for (const [key, item] of value) {
      const child = render(item, { fieldName: key, depth, path: `${ctx.path}.${key}` }, settings)
      pairs.push(`(${keySymbol(prefix, key)} ${child})`)
    }
    return layout.list(pairs, ctx.depth)
  }

  if (isSequence(value)) {
    const items = value.map((item, idx) =>
      render(item, { fieldName: ctx.fieldName, depth, path: `${ctx.path}[${idx}]` }, settings),
    )
    return layout.list(items, ctx.depth)
  }

  if (value === null) return SEXPR_CONSTANTS.NIL
  if (typeof value === "boolean") return value ? SEXPR_CONSTANTS.TRUE : SEXPR_CONSTANTS.FALSE
  if (typeof value === "number") return formatNumber(value)
  if (value instanceof NumberLiteral) return value.text
  if (typeof value === "string") return renderString(value, ctx, settings)
  return unsupported(value, ctx.path)
}

// reached only when the caller bypassed the type system
const unsupported = (value: never, path: string): never => {
  const input: unknown = value
  throw new UnsupportedValueError(path, typeof input)
}

/**
 * Converts a document tree into S-expression text.
 *
 * Mapping entries become `(prefix:key value)` pairs, sequences become plain
 * lists, booleans `#t`/`#f`, null `nil`. Strings under a date-named field that
 * look like `YYYY-MM-DD` become `(make-date YYYY MM DD)`, part numbers such as
 * `A4786` become quoted symbols, and everything else is a string literal.
 *
 * @throws {InvalidOptionsError} when the options do not validate
 * @throws {UnsupportedValueError} when the tree holds something that is not a Value
 */
export const toSExpr = (value: Value, options: ConvertOptionsInput): string => {
  const resolved = resolveConvertOptions(options)
  const settings: Settings = {
    prefix: resolved.prefix,
    layout: resolved.pretty ? indentedLayout(resolved.indent) : compactLayout,
    dateMarkers: resolved.dateMarkers,
  }
  return render(value, { depth: 0, path: "$" }, settings)
}

/**
 * Shorthand for `toSExpr` with the default indent and date markers. `fieldName`
 * is the key the value sits under, when converting a fragment of a larger tree.
 */
export const convert = (
  value: Value,
  prefix: string,
  pretty: boolean = false,
  fieldName?: string,
): string => {
  const settings: Settings = {
    prefix,
    layout: pretty ? indentedLayout(SEXPR_CONSTANTS.INDENT_SIZE) : compactLayout,
    dateMarkers: SEXPR_CONSTANTS.DATE_MARKERS,
  }
  return render(value, { fieldName, depth: 0, path: "$" }, settings)
}
