import type { Logger } from "pino"
import any from "./any.js"
import { ParseError, UsageError } from "./errors.js"
import { SEXPR_CONSTANTS } from "./types/value.js"
import { logger } from "./utils/logger.js"

export const USAGE = `sexpr-data - convert JSON or YAML documents to S-expressions

Usage: sexpr-data <input-file> [options]

Options:
  --pretty               Indent nested lists, one element per line
  --prefix <name>        Namespace prefix for keys (default: the input format)
  --indent <n>           Spaces per pretty-print level (default: ${SEXPR_CONSTANTS.INDENT_SIZE})
  --date-marker <text>   Extra field-name marker for the date rule (repeatable)
  --help                 Show this help message

Supported formats: .json, .yaml, .yml
Other files are sniffed: the detected format is tried first, then the other.`

export interface CliArgs {
  input?: string
  help: boolean
  pretty: boolean
  prefix?: string
  indent?: number
  dateMarkers: string[]
}

/**
 * Where the CLI writes. Tests pass collectors; the bin entry uses the process streams.
 */
export interface CliIO {
  stdout(text: string): void
  stderr(text: string): void
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}

/**
 * @throws {UsageError} on unknown flags, a flag missing its value, or a second input file
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, pretty: false, dateMarkers: [] }

  const valueOf = (flag: string, idx: number): string => {
    const value = argv[idx + 1]
    if (value === undefined || value.startsWith("--")) throw new UsageError(`${flag} requires a value`)
    return value
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === "--help" || arg === "-h") {
      args.help = true
    } else if (arg === "--pretty") {
      args.pretty = true
    } else if (arg === "--prefix") {
      args.prefix = valueOf(arg, i)
      i++
    } else if (arg === "--indent") {
      args.indent = Number(valueOf(arg, i))
      i++
    } else if (arg === "--date-marker") {
      args.dateMarkers.push(valueOf(arg, i))
      i++
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`)
    } else if (args.input === undefined) {
      args.input = arg
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`)
    }
  }

  return args
}

/**
 * Runs one conversion and resolves to the process exit code.
 */
export async function run(argv: string[], io: CliIO = processIO, log: Logger = logger): Promise<number> {
  try {
    const args = parseArgs(argv)
    if (args.help) {
      io.stdout(`${USAGE}\n`)
      return 0
    }
    if (args.input === undefined) {
      io.stderr(`${USAGE}\n`)
      return 1
    }

    const started = Date.now()
    log.debug({ input: args.input }, "loading input")
    const data = await any.loadFile(args.input)
    // loadFile only resolves to null when errors are suppressed
    if (data === null) throw new ParseError(`${args.input}: no parser accepted the input`)
    log.debug({ format: data.originFormat }, "parsed input")

    const output = data.toSExpr({
      pretty: args.pretty,
      prefix: args.prefix,
      indent: args.indent,
      dateMarkers: [...SEXPR_CONSTANTS.DATE_MARKERS, ...args.dateMarkers],
    })
    log.debug({ ms: Date.now() - started, length: output.length }, "converted")

    io.stdout(`${output}\n`)
    return 0
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`Error: ${e.message}\n\n${USAGE}\n`)
      return 1
    }
    log.error({ err: e }, "conversion failed")
    io.stderr(`Error: ${e instanceof Error ? e.message : String(e)}\n`)
    return 1
  }
}
