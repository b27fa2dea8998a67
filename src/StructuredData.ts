import type { ConvertOptionsInput } from "./options.js"
import { toSExpr } from "./sexpr.js"
import type { OriginFormat, Value } from "./types/value.js"

/**
 * Options for `StructuredData.toSExpr`. The prefix falls back to the name of
 * the format the data was parsed from.
 */
export type SExprOptions = Partial<ConvertOptionsInput>

/**
 * Common wrapper returned by every parser. Remembers which format produced the
 * data and renders it as S-expression text.
 */
export default class StructuredData {
  private _data: Value
  originFormat: OriginFormat

  /**
   * @param data Document tree produced by the parser
   * @param originFormat Which parser created the tree; doubles as the default
   * namespace prefix
   */
  constructor(data: Value, originFormat: OriginFormat) {
    this._data = data
    this.originFormat = originFormat
  }

  /** The parsed document tree. */
  get data(): Value {
    return this._data
  }

  /**
   * Converts the document to S-expression text, compact unless `pretty` is
   * set. Keys are namespaced with `prefix`, which defaults to the origin
   * format (`yaml:receipt`, `json:receipt`).
   */
  toSExpr(options: SExprOptions = {}): string {
    return toSExpr(this._data, { ...options, prefix: options.prefix ?? this.originFormat })
  }
}
