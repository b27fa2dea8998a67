import { type Document, isAlias, isMap, isScalar, isSeq } from "yaml"
import { UnsupportedValueError } from "../errors.js"
import type { Value } from "../types/value.js"
import { floatOf, keyName, toValue } from "./value.js"

const resolve = (node: unknown, doc: Document.Parsed, path: string): unknown => {
  if (!isAlias(node)) return node
  const target = node.resolve(doc)
  if (target === undefined) throw new UnsupportedValueError(path, "unresolved alias")
  return target
}

const walk = (node: unknown, doc: Document.Parsed, path: string, open: Set<unknown>): Value => {
  const target = resolve(node, doc, path)

  if (isScalar(target)) {
    // integers are read as bigint, so a number here was written as a float
    return typeof target.value === "number" ? floatOf(target.value) : toValue(target.value, path)
  }

  if (isMap(target) || isSeq(target)) {
    if (open.has(target)) throw new UnsupportedValueError(path, "recursive alias")
    open.add(target)
    try {
      if (isSeq(target)) {
        return target.items.map((item, idx) => walk(item, doc, `${path}[${idx}]`, open))
      }
      const mapping = new Map<string, Value>()
      for (const pair of target.items) {
        const key = resolve(pair.key, doc, path)
        if (isMap(key) || isSeq(key)) {
          throw new UnsupportedValueError(path, isMap(key) ? "mapping key" : "sequence key")
        }
        const name = keyName(isScalar(key) ? key.value : key, path)
        mapping.set(name, walk(pair.value, doc, `${path}.${name}`, open))
      }
      return mapping
    } finally {
      open.delete(target)
    }
  }

  // empty documents and empty values
  if (target === null) return null
  throw new UnsupportedValueError(path, typeof target)
}

/**
 * Builds a document tree straight from the parser's node tree. Mapping order
 * is the source order, aliases are followed, and numbers keep what `toJS`
 * would lose: the `.0` of whole floats and the digits of large integers (the
 * document must be parsed with `intAsBigInt`).
 *
 * @throws {UnsupportedValueError} for mapping or sequence keys and recursive aliases
 */
export const fromDocument = (doc: Document.Parsed): Value => walk(doc.contents, doc, "$", new Set())
