import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import { makeLogCapture, provideNodeContext, withConfigFile } from "./test-helpers.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "plainconf", ...args]

describe("plainconf commands", () => {
  it.effect("sets typed values and gets them back", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        expect(yield* _(runCli(argv("set", file, "port", "8080", "--type", "int")))).toEqual({
          output: [],
          exitCode: 0
        })
        yield* _(runCli(argv("set", file, "tags", "[1, 'a']", "--type=literal")))
        yield* _(runCli(argv("set", file, "name", "demo")))
        expect(yield* _(fs.readFileString(file))).toBe("port/i=8080\ntags/r=[1, 'a']\nname=demo\n")
        expect((yield* _(runCli(argv("get", file, "port")))).output).toEqual(["8080"])
        expect((yield* _(runCli(argv("get", file, "tags")))).output).toEqual(["[1, 'a']"])
        expect((yield* _(runCli(argv("get", file, "name")))).output).toEqual(["demo"])
      })
    ).pipe(provideNodeContext))

  it.effect("replaces a value in place", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "# app\nname=old\nport/i=1\n"))
        yield* _(runCli(argv("set", file, "name", "new")))
        expect(yield* _(fs.readFileString(file))).toBe("# app\nname=new\nport/i=1\n")
      })
    ).pipe(provideNodeContext))

  it.effect("wraps long values at the requested width", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(runCli(argv("set", file, "k", "abcdefghij", "--width", "8", "--continuation", "|")))
        expect(yield* _(fs.readFileString(file))).toBe("k/C|=ab|\ncdefghij\n")
        expect((yield* _(runCli(argv("get", file, "k")))).output).toEqual(["abcdefghij"])
      })
    ).pipe(provideNodeContext))

  it.effect("lists keys in file order", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "b=1\n# note\na=2\n"))
        expect((yield* _(runCli(argv("list", file)))).output).toEqual(["b", "a"])
      })
    ).pipe(provideNodeContext))

  it.effect("drops the line of a removed key even with --rewrite-old", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "a=1\n# keep\nb=2\n"))
        yield* _(runCli(argv("unset", file, "a", "--rewrite-old")))
        expect(yield* _(fs.readFileString(file))).toBe("# keep\nb=2\n")
      })
    ).pipe(provideNodeContext))

  it.effect("warns and leaves the file alone when unsetting a missing key", () => {
    const capture = makeLogCapture()
    return withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "a = 1\n"))
        yield* _(runCli(argv("unset", file, "zzz")))
        expect(yield* _(fs.readFileString(file))).toBe("a = 1\n")
        expect(capture.lines).toEqual([`WARN  [${file} key=zzz] key zzz is not set`])
      })
    ).pipe((effect) => provideNodeContext(effect, capture))
  })

  it.effect("reports a missing key", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "a=1\n"))
        const error = yield* _(Effect.flip(runCli(argv("get", file, "nope"))))
        expect(error).toEqual({ _tag: "KeyNotFound", key: "nope", file })
      })
    ).pipe(provideNodeContext))

  it.effect("refuses to rewrite a file holding entries readable only with --unsafe", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        const original = "secret/64p=AA==\na=1\n"
        yield* _(fs.writeFileString(file, original))
        expect(yield* _(Effect.flip(runCli(argv("set", file, "a", "2"))))).toEqual({
          _tag: "OpaqueEntriesError",
          file,
          keys: ["secret"]
        })
        expect(yield* _(Effect.flip(runCli(argv("unset", file, "a"))))).toEqual({
          _tag: "OpaqueEntriesError",
          file,
          keys: ["secret"]
        })
        expect(yield* _(fs.readFileString(file))).toBe(original)
      })
    ).pipe(provideNodeContext))

  it.effect("lets set replace the refused entry itself", () =>
    withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "secret/64p=AA==\na=1\n"))
        yield* _(runCli(argv("set", file, "secret", "plain")))
        expect(yield* _(fs.readFileString(file))).toBe("a=1\nsecret=plain\n")
      })
    ).pipe(provideNodeContext))

  it.effect("reports argument errors", () =>
    Effect.gen(function*(_) {
      expect(yield* _(Effect.flip(runCli(argv("frob"))))).toEqual({
        _tag: "CliError",
        message: "Unknown command: frob"
      })
      expect(yield* _(Effect.flip(runCli(argv("set", "x.conf", "port", "x", "--type", "int"))))).toEqual({
        _tag: "CliError",
        message: "Invalid int value: invalid integer: \"x\""
      })
    }).pipe(provideNodeContext))

  it.effect("--silent hides warnings", () => {
    const capture = makeLogCapture()
    return withConfigFile(({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "junk\na=1\n"))
        expect((yield* _(runCli(argv("list", file, "--silent")))).output).toEqual(["a"])
        expect(capture.lines).toEqual([])
        yield* _(runCli(argv("list", file)))
        expect(capture.lines).toEqual([`WARN  [${file}:1] [malformed-line] line 1: missing "=": "junk"`])
      })
    ).pipe((effect) => provideNodeContext(effect, capture))
  })
})
