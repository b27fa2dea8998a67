/**
 * Raised when no adapter could parse the input. `errors` maps each format that
 * was tried to the message its parser produced.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly errors: Partial<Record<string, string>> = {},
  ) {
    super(message)
    this.name = "ParseError"
  }
}

/**
 * A value outside the closed set of document values reached the converter.
 * This points at a bug in whatever built the tree, not at bad user input.
 */
export class UnsupportedValueError extends Error {
  constructor(
    readonly path: string,
    readonly valueType: string,
  ) {
    super(`Unsupported value of type ${valueType} at ${path}`)
    this.name = "UnsupportedValueError"
  }
}

export class InvalidOptionsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid options:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`)
    this.name = "InvalidOptionsError"
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}
