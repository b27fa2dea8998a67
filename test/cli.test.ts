import assert from "assert"
import { promises as fs } from "fs"
import { pino, type Logger } from "pino"
import { parseArgs, run, USAGE, type CliIO } from "../src/cli.js"
import { UsageError } from "../src/index.js"

type Captured = CliIO & { out: string; err: string; logs: string[]; log: Logger }

const capture = (): Captured => {
  const logs: string[] = []
  const io: Captured = {
    out: "",
    err: "",
    logs,
    log: pino({ level: "error" }, { write: (line: string) => logs.push(line) }),
    stdout: (text: string) => {
      io.out += text
    },
    stderr: (text: string) => {
      io.err += text
    },
  }
  return io
}

describe("cli", () => {
  describe("parseArgs", () => {
    it("should collect the input and every option", () => {
      assert.deepStrictEqual(
        parseArgs(["a.yaml", "--pretty", "--prefix", "x", "--indent", "4", "--date-marker", "t", "--date-marker", "u"]),
        { help: false, pretty: true, dateMarkers: ["t", "u"], input: "a.yaml", prefix: "x", indent: 4 },
      )
    })

    it("should default to compact output without an input", () => {
      assert.deepStrictEqual(parseArgs([]), { help: false, pretty: false, dateMarkers: [] })
    })

    it("should reject a flag without its value", () => {
      assert.throws(() => parseArgs(["a.yaml", "--prefix"]), {
        name: "UsageError",
        message: "--prefix requires a value",
      })
      assert.throws(() => parseArgs(["--indent", "--pretty"]), UsageError)
    })

    it("should reject unknown flags and extra arguments", () => {
      assert.throws(() => parseArgs(["--bogus"]), { message: "Unknown option: --bogus" })
      assert.throws(() => parseArgs(["a.yaml", "b.yaml"]), { message: "Unexpected argument: b.yaml" })
    })
  })

  describe("run", () => {
    before(async () => {
      await fs.writeFile("cli-test.yaml", "receipt: Oz-Ware Purchase Invoice\ndate: 2012-08-06\n")
      await fs.writeFile("cli-test.json", "{\"start_time\": \"2024-01-31\", \"tags\": [\"a\"]}")
      await fs.writeFile("cli-bad.yaml", "items: [1, 2")
    })

    after(async () => {
      await fs.unlink("cli-test.yaml")
      await fs.unlink("cli-test.json")
      await fs.unlink("cli-bad.yaml")
    })

    it("should print usage for --help", async () => {
      const io = capture()

      assert.strictEqual(await run(["--help"], io, io.log), 0)
      assert.strictEqual(io.out, `${USAGE}\n`)
      assert.strictEqual(io.err, "")
    })

    it("should print usage to stderr when no input is given", async () => {
      const io = capture()

      assert.strictEqual(await run([], io, io.log), 1)
      assert.strictEqual(io.out, "")
      assert.strictEqual(io.err, `${USAGE}\n`)
    })

    it("should report usage errors", async () => {
      const io = capture()

      assert.strictEqual(await run(["--bogus"], io, io.log), 1)
      assert.strictEqual(io.err, `Error: Unknown option: --bogus\n\n${USAGE}\n`)
    })

    it("should convert a yaml file to compact output", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-test.yaml"], io, io.log), 0)
      assert.strictEqual(
        io.out,
        "((yaml:receipt \"Oz-Ware Purchase Invoice\") (yaml:date (make-date 2012 08 06)))\n",
      )
      assert.strictEqual(io.err, "")
    })

    it("should apply --pretty, --prefix and --indent", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-test.yaml", "--pretty", "--prefix", "oz", "--indent", "1"], io, io.log), 0)
      assert.strictEqual(
        io.out,
        ["(", " (oz:receipt \"Oz-Ware Purchase Invoice\")", " (oz:date (make-date 2012 08 06))", ")", ""].join(
          "\n",
        ),
      )
    })

    it("should add --date-marker to the default markers", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-test.json", "--date-marker", "time"], io, io.log), 0)
      assert.strictEqual(io.out, "((json:start_time (make-date 2024 01 31)) (json:tags (\"a\")))\n")
    })

    it("should report a missing file", async () => {
      const io = capture()

      assert.strictEqual(await run(["missing.yaml"], io, io.log), 1)
      assert.strictEqual(io.out, "")
      assert.strictEqual(io.err, "Error: ENOENT: no such file or directory, open 'missing.yaml'\n")
    })

    it("should report a parse failure with the file name", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-bad.yaml"], io, io.log), 1)
      assert.ok(io.err.startsWith("Error: Failed to parse cli-bad.yaml as yaml: "))
    })

    it("should log failures at error level", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-bad.yaml"], io, io.log), 1)
      assert.strictEqual(io.logs.length, 1)
      assert.match(io.logs[0], /"level":50,/)
      assert.match(io.logs[0], /"msg":"conversion failed"/)
    })

    it("should log nothing at error level on success", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-test.yaml"], io, io.log), 0)
      assert.deepStrictEqual(io.logs, [])
    })

    it("should describe how other files are tried", () => {
      assert.ok(USAGE.endsWith("Other files are sniffed: the detected format is tried first, then the other."))
    })

    it("should report invalid options", async () => {
      const io = capture()

      assert.strictEqual(await run(["cli-test.yaml", "--indent", "99"], io, io.log), 1)
      assert.strictEqual(io.err, "Error: Invalid options:\n  - indent: Number must be less than or equal to 8\n")
    })
  })
})
