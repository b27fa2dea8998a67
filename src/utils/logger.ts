import pino from "pino"
import { z } from "zod"

const levelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
  .catch("warn")

/**
 * Diagnostics go to stderr; stdout carries nothing but converter output.
 * LOG_LEVEL picks the level, unknown values fall back to `warn`.
 */
export const logger = pino(
  { name: "sexpr-data", level: levelSchema.parse(process.env.LOG_LEVEL) },
  pino.destination(2),
)
