import { describe, expect, it } from "@effect/vitest"
import { Cause, Effect, HashMap } from "effect"

import { formatLogLine } from "../../src/shell/logger.js"

const annotations = (entries: ReadonlyArray<readonly [string, unknown]>) =>
  HashMap.fromIterable<string, unknown>(entries)

describe("formatLogLine", () => {
  it.effect("pads the level and joins message parts", () =>
    Effect.sync(() => {
      expect(formatLogLine("INFO", ["hello"], annotations([]))).toBe("INFO  hello")
      expect(formatLogLine("WARN", ["a", 1], annotations([]))).toBe("WARN  a 1")
    }))

  it.effect("shows file, line and key context", () =>
    Effect.sync(() => {
      expect(
        formatLogLine("WARN", ["bad line"], annotations([["file", "a.conf"], ["line", 3], ["key", "port"]]))
      ).toBe("WARN  [a.conf:3 key=port] bad line")
      expect(formatLogLine("ERROR", ["too long"], annotations([["key", "k"]]))).toBe("ERROR [key=k] too long")
      expect(formatLogLine("INFO", ["x"], annotations([["file", "a.conf"]]))).toBe("INFO  [a.conf] x")
    }))

  it.effect("ignores other annotations and a line without a file", () =>
    Effect.sync(() => {
      expect(formatLogLine("INFO", ["x"], annotations([["line", 4], ["request", "r-1"]]))).toBe("INFO  x")
    }))

  it.effect("appends a non-empty cause on the following lines", () =>
    Effect.sync(() => {
      const text = formatLogLine("ERROR", ["boom"], annotations([]), Cause.fail("bad"))
      expect(text.startsWith("ERROR boom\n")).toBe(true)
      expect(text.split("\n").length).toBeGreaterThan(1)
    }))
})
