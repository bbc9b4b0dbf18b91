import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { continuationCandidates, DEFAULT_CONTINUATION_CHARS } from "../../src/core/config.js"
import { chooseContinuation, renderLine } from "../../src/core/render.js"

const defaults = continuationCandidates(DEFAULT_CONTINUATION_CHARS)

describe("chooseContinuation", () => {
  it.effect("skips candidates present in the payload", () =>
    Effect.sync(() => {
      expect(chooseContinuation("a\\b|c", ["\\", "|", "⤸"])).toBe("⤸")
      expect(chooseContinuation("plain", ["\\", "|"])).toBe("\\")
      expect(chooseContinuation("\\|", ["\\", "|"])).toBeUndefined()
    }))
})

describe("continuationCandidates", () => {
  it.effect("drops forbidden and repeated characters", () =>
    Effect.sync(() => {
      expect(continuationCandidates("|=|\n;\r")).toEqual(["|", ";"])
      expect(continuationCandidates("⤸↓")).toEqual(["⤸", "↓"])
    }))
})

describe("renderLine", () => {
  it.effect("keeps short entries on one line", () =>
    Effect.sync(() => {
      expect(renderLine("port", "i", "8080", { maxWidth: 72, continuationChars: defaults })).toEqual({
        lines: ["port/i=8080\n"],
        unsplittable: false
      })
      expect(renderLine("name", "", "value", { maxWidth: 72, continuationChars: defaults })).toEqual({
        lines: ["name=value\n"],
        unsplittable: false
      })
    }))

  it.effect("never wraps when the width is zero", () =>
    Effect.sync(() => {
      const payload = "x".repeat(500)
      expect(renderLine("k", "", payload, { maxWidth: 0, continuationChars: defaults }).lines).toEqual([
        `k=${payload}\n`
      ])
    }))

  it.effect("wraps once the line reaches the width", () =>
    Effect.sync(() => {
      const options = (maxWidth: number) => ({ maxWidth, continuationChars: ["|"] })
      expect(renderLine("k", "", "abcdefg", options(11)).lines).toEqual(["k=abcdefg\n"])
      expect(renderLine("k", "", "abcdefg", options(10)).lines).toEqual(["k/C|=abcd|\n", "efg\n"])
    }))

  it.effect("cuts at the budget when no separator is near", () =>
    Effect.sync(() => {
      expect(renderLine("k", "", "abcdefghij", { maxWidth: 8, continuationChars: ["|"] })).toEqual({
        lines: ["k/C|=ab|\n", "cdefghij\n"],
        unsplittable: false
      })
    }))

  it.effect("prefers cutting before a space", () =>
    Effect.sync(() => {
      expect(
        renderLine("key", "", "alpha beta gamma delta epsilon", { maxWidth: 20, continuationChars: defaults }).lines
      ).toEqual(["key/C\\=alpha beta\\\n", " gamma delta epsilon\n"])
    }))

  it.effect("puts the continuation in front of the codec modifier", () =>
    Effect.sync(() => {
      expect(renderLine("n", "i", "1234567890", { maxWidth: 10, continuationChars: ["|"] }).lines).toEqual([
        "n/C|i=123|\n",
        "4567890\n"
      ])
    }))

  it.effect("flags entries with no usable marker", () =>
    Effect.sync(() => {
      expect(renderLine("k", "", "a|b|c|d|e|f", { maxWidth: 5, continuationChars: ["|"] })).toEqual({
        lines: ["k=a|b|c|d|e|f\n"],
        unsplittable: true
      })
    }))

  it.effect("counts code points, not UTF-16 units", () =>
    Effect.sync(() => {
      expect(renderLine("k", "", "😀😀😀😀😀😀😀", { maxWidth: 11, continuationChars: ["|"] }).lines).toEqual([
        "k=😀😀😀😀😀😀😀\n"
      ])
    }))
})
