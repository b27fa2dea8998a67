import { z } from "zod"
import { InvalidOptionsError } from "./errors.js"
import { SEXPR_CONSTANTS } from "./types/value.js"

/**
 * Options accepted by `toSExpr`. Only `prefix` is required.
 */
export const convertOptionsSchema = z.object({
  prefix: z.string(),
  pretty: z.boolean().default(false),
  indent: z.number().int().min(0).max(8).default(SEXPR_CONSTANTS.INDENT_SIZE),
  dateMarkers: z
    .array(z.string().min(1, "date marker must not be empty"))
    .default([...SEXPR_CONSTANTS.DATE_MARKERS]),
})

export type ConvertOptionsInput = z.input<typeof convertOptionsSchema>
export type ConvertOptions = z.output<typeof convertOptionsSchema>

/**
 * Validates options against a schema and fills in defaults
 * @throws {InvalidOptionsError} listing every issue as `path: message`
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.errors.map((err) => `${err.path.join(".") || "root"}: ${err.message}`),
    )
  }
  return result.data
}

export const resolveConvertOptions = (input: ConvertOptionsInput): ConvertOptions =>
  parseOptions(convertOptionsSchema, input)
