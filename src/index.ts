import json from "./json.js"
import yaml from "./yaml.js"
import any from "./any.js"
import StructuredData from "./StructuredData.js"

/**
 * Public entrypoint for sexpr-data. Re-exports each format adapter, the
 * StructuredData container and the converter itself so downstream consumers
 * can do named imports like `import { yaml, toSExpr } from "sexpr-data"`.
 *
 * Exports:
 * - `json` : Thin wrapper around JSON.parse with StructuredData semantics.
 * - `yaml` : YAML 1.2 adapter built on the `yaml` package.
 * - `any`  : Facade that auto-detects and delegates to a specific parser.
 * - `StructuredData`: Format-agnostic container with `toSExpr`.
 * - `toSExpr` / `convert`: the converter, for trees built by other means.
 */
export { json, yaml, any, StructuredData }
export { convert, toSExpr } from "./sexpr.js"
export { toValue, mappingOf } from "./utils/value.js"
export { fromDocument } from "./utils/document.js"
export { NumberLiteral } from "./types/value.js"
export { detectFormat, formatFromPath } from "./utils/detectFormat.js"
export { ParseError, UnsupportedValueError, InvalidOptionsError, UsageError } from "./errors.js"
export type { ConvertOptions, ConvertOptionsInput } from "./options.js"
export type { SExprOptions } from "./StructuredData.js"
export type { Value, Mapping, Sequence, Scalar, OriginFormat } from "./types/value.js"
export type { default as DataFormat } from "./types/DataFormat.js"
