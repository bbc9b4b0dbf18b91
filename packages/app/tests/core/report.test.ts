import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { displayValue, renderAppError, renderDecodeError, renderDiagnostic } from "../../src/core/report.js"
import { bytes, float, list, opaque, str } from "../../src/core/value.js"

describe("renderDecodeError", () => {
  it.effect("describes each decode failure", () =>
    Effect.sync(() => {
      expect(renderDecodeError({ _tag: "UnsafeOperationError", operation: "p" })).toBe(
        "operation \"p\" needs unsafe mode"
      )
      expect(renderDecodeError({ _tag: "TypeMismatchError", operation: "s", actual: "Str" })).toBe(
        "s: cannot apply to Str"
      )
      expect(renderDecodeError({ _tag: "UnknownModifierError", modifier: "x" })).toBe("unknown modifier \"x\"")
      expect(renderDecodeError({ _tag: "EncodingError", operation: "32", message: "Invalid padding" })).toBe(
        "32: Invalid padding"
      )
    }))
})

describe("renderDiagnostic", () => {
  it.effect("prefixes the diagnostic type", () =>
    Effect.sync(() => {
      expect(renderDiagnostic({ type: "malformed-line", line: 3, text: "oops", reason: "missing \"=\"" })).toBe(
        "[malformed-line] line 3: missing \"=\": \"oops\""
      )
      expect(
        renderDiagnostic({
          type: "decode-failed",
          line: 7,
          key: "port",
          error: { _tag: "FormatError", operation: "i", message: "invalid integer: \"x\"" }
        })
      ).toBe("[decode-failed] line 7 key port: i: invalid integer: \"x\"")
      expect(renderDiagnostic({ type: "unsplittable", key: "k" })).toBe(
        "[unsplittable] key k: no continuation character left"
      )
    }))
})

describe("renderAppError", () => {
  it.effect("describes application errors", () =>
    Effect.sync(() => {
      expect(renderAppError({ _tag: "KeyNotFound", key: "port", file: "app.conf" })).toBe(
        "key port not found in app.conf"
      )
      expect(renderAppError({ _tag: "InvalidKeyError", key: "a=b", reason: "key contains \"=\"" })).toBe(
        "invalid key \"a=b\": key contains \"=\""
      )
      expect(renderAppError({ _tag: "UnsafeValueError", key: "when", valueType: "Opaque(Date)", reason: "no" }))
        .toBe("cannot write key when (Opaque(Date)): no")
      expect(renderAppError({ _tag: "UnexpectedEndOfInput", line: 4, key: "k", marker: "|" })).toBe(
        "line 4 key k: input ended inside a \"|\" continuation"
      )
      expect(renderAppError({ _tag: "CliError", message: "Missing command" })).toBe("Missing command")
      expect(renderAppError({ _tag: "OpaqueEntriesError", file: "app.conf", keys: ["a", "b"] })).toBe(
        "app.conf has entries that can only be read with --unsafe (a, b); rewriting it would drop them"
      )
    }))
})

describe("displayValue", () => {
  it.effect("prints strings raw and other values as literals", () =>
    Effect.sync(() => {
      expect(displayValue(str("it's"))).toBe("it's")
      expect(displayValue(float(1))).toBe("1.0")
      expect(displayValue(bytes(new Uint8Array([0x61])))).toBe("b'a'")
      expect(displayValue(list([str("x")]))).toBe("['x']")
      expect(displayValue(opaque(new Date(0)))).toBe("<opaque>")
    }))
})
