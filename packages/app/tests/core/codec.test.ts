import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeValue, encodeValue } from "../../src/core/codec.js"
import { resolveReadOptions } from "../../src/core/config.js"
import type { ConfigValue } from "../../src/core/value.js"
import { bool, bytes, dict, float, int, list, nullValue, opaque, str, tuple } from "../../src/core/value.js"

const safe = resolveReadOptions()
const unsafe = resolveReadOptions({ safe: false })

const encoded = (value: ConfigValue) => encodeValue(value, safe)

describe("encodeValue", () => {
  it.effect("stores plain strings verbatim", () =>
    Effect.sync(() => {
      expect(encoded(str("hello world"))).toEqual(Either.right({ modifier: "", payload: "hello world" }))
      expect(encoded(str(""))).toEqual(Either.right({ modifier: "", payload: "" }))
    }))

  it.effect("quotes strings whose only controls are tab, CR or LF", () =>
    Effect.sync(() => {
      expect(encoded(str("a\tb"))).toEqual(Either.right({ modifier: "r", payload: "'a\\tb'" }))
      expect(encoded(str("one\r\ntwo"))).toEqual(Either.right({ modifier: "r", payload: "'one\\r\\ntwo'" }))
    }))

  it.effect("base64-encodes strings with other control characters", () =>
    Effect.sync(() => {
      expect(encoded(str("\x00"))).toEqual(Either.right({ modifier: "64s", payload: "AA==" }))
      expect(encoded(str("a\x00b"))).toEqual(Either.right({ modifier: "64s", payload: "YQBi" }))
      expect(encoded(str("\u0085"))).toEqual(Either.right({ modifier: "64s", payload: "woU=" }))
    }))

  it.effect("encodes scalars by type", () =>
    Effect.sync(() => {
      expect(encoded(bool(true))).toEqual(Either.right({ modifier: "r", payload: "True" }))
      expect(encoded(nullValue)).toEqual(Either.right({ modifier: "r", payload: "None" }))
      expect(encoded(int(-42))).toEqual(Either.right({ modifier: "i", payload: "-42" }))
      expect(encoded(float(3))).toEqual(Either.right({ modifier: "f", payload: "3.0" }))
      expect(encoded(float(0.1))).toEqual(Either.right({ modifier: "f", payload: "0.1" }))
      expect(encoded(bytes(new Uint8Array([0x00, 0x01, 0xff])))).toEqual(
        Either.right({ modifier: "32", payload: "AAA76===" })
      )
    }))

  it.effect("writes literal-safe containers in literal syntax", () =>
    Effect.sync(() => {
      expect(encoded(list([int(1), str("a")]))).toEqual(Either.right({ modifier: "r", payload: "[1, 'a']" }))
      expect(encoded(dict<ConfigValue>([[str("k"), tuple([nullValue])]]))).toEqual(
        Either.right({ modifier: "r", payload: "{'k': (None,)}" })
      )
    }))

  it.effect("refuses opaque values in safe mode", () =>
    Effect.sync(() => {
      expect(encoded(opaque(new Date(0)))).toEqual(
        Either.left({
          _tag: "UnsafeValueError",
          key: undefined,
          valueType: "Opaque(Date)",
          reason: "value is outside the literal closure and `safe` is enabled"
        })
      )
      const nested = encoded(list([opaque(new Date(0))]))
      expect(Either.isLeft(nested) && nested.left.valueType).toBe("List")
    }))

  it.effect("serializes opaque values in unsafe mode", () =>
    Effect.sync(() => {
      const value = opaque(new Map([["a", 1]]))
      const result = encodeValue(value, unsafe)
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result)) {
        expect(result.right.modifier).toBe("64p")
        expect(decodeValue(result.right.modifier, result.right.payload, unsafe)).toEqual(Either.right(value))
      }
    }))
})

describe("decodeValue", () => {
  it.effect("returns the payload for the empty modifier", () =>
    Effect.sync(() => {
      expect(decodeValue("", "a=b / c", safe)).toEqual(Either.right(str("a=b / c")))
    }))

  it.effect("parses numbers", () =>
    Effect.sync(() => {
      expect(decodeValue("i", " 42 ", safe)).toEqual(Either.right(int(42)))
      expect(decodeValue("i", "123456789012345678901234567890", safe)).toEqual(
        Either.right(int(123456789012345678901234567890n))
      )
      expect(decodeValue("f", "inf", safe)).toEqual(Either.right(float(Number.POSITIVE_INFINITY)))
      expect(decodeValue("f", "-0.0", safe)).toEqual(Either.right(float(-0)))
    }))

  it.effect("reports non-numeric text as a format error", () =>
    Effect.sync(() => {
      expect(decodeValue("i", "4x", safe)).toEqual(
        Either.left({ _tag: "FormatError", operation: "i", message: "invalid integer: \"4x\"" })
      )
      expect(decodeValue("f", "one", safe)).toEqual(
        Either.left({ _tag: "FormatError", operation: "f", message: "invalid float: \"one\"" })
      )
    }))

  it.effect("decodes base32 and base64", () =>
    Effect.sync(() => {
      expect(decodeValue("32", "AAA76===", safe)).toEqual(Either.right(bytes(new Uint8Array([0x00, 0x01, 0xff]))))
      expect(decodeValue("64s", "AA==", safe)).toEqual(Either.right(str("\x00")))
      expect(decodeValue("64s", "YQBi", safe)).toEqual(Either.right(str("a\x00b")))
    }))

  it.effect("rejects bad base32 and base64 text", () =>
    Effect.sync(() => {
      const lower = decodeValue("32", "aaa76===", safe)
      expect(Either.isLeft(lower) && lower.left._tag).toBe("EncodingError")
      const base64 = decodeValue("64", "!!", safe)
      expect(Either.isLeft(base64) && base64.left._tag).toBe("EncodingError")
    }))

  it.effect("applies s and b conversions", () =>
    Effect.sync(() => {
      expect(decodeValue("is", "42", safe)).toEqual(Either.right(str("42")))
      expect(decodeValue("bs", "héllo", safe)).toEqual(Either.right(str("héllo")))
      expect(decodeValue("b", "hi", safe)).toEqual(Either.right(bytes(new Uint8Array([0x68, 0x69]))))
      expect(decodeValue("s", "abc", safe)).toEqual(
        Either.left({ _tag: "TypeMismatchError", operation: "s", actual: "Str" })
      )
      expect(decodeValue("ib", "1", safe)).toEqual(
        Either.left({ _tag: "TypeMismatchError", operation: "b", actual: "Int" })
      )
    }))

  it.effect("lets text operations read bytes left by an earlier step", () =>
    Effect.sync(() => {
      expect(decodeValue("6464s", "TkRJPQ==", safe)).toEqual(Either.right(str("42")))
      expect(decodeValue("64i", "NDI=", safe)).toEqual(Either.right(int(42)))
      expect(decodeValue("bf", "1.5", safe)).toEqual(Either.right(float(1.5)))
      expect(decodeValue("r32", "b'AAA76==='", safe)).toEqual(Either.right(bytes(new Uint8Array([0x00, 0x01, 0xff]))))
      expect(decodeValue("64f", "/w==", safe)).toEqual(
        Either.left({ _tag: "EncodingError", operation: "f", message: "payload is not valid UTF-8" })
      )
      const outsideAlphabet = decodeValue("6432", "/w==", safe)
      expect(Either.isLeft(outsideAlphabet) && outsideAlphabet.left).toMatchObject({
        _tag: "EncodingError",
        operation: "32"
      })
    }))

  it.effect("rejects invalid UTF-8 under s", () =>
    Effect.sync(() => {
      expect(decodeValue("64s", "/w==", safe)).toEqual(
        Either.left({ _tag: "EncodingError", operation: "s", message: "payload is not valid UTF-8" })
      )
    }))

  it.effect("evaluates literals", () =>
    Effect.sync(() => {
      expect(decodeValue("r", "True", safe)).toEqual(Either.right(bool(true)))
      expect(decodeValue("r", "[1, 'a']", safe)).toEqual(Either.right(list([int(1), str("a")])))
    }))

  it.effect("names unknown modifiers", () =>
    Effect.sync(() => {
      expect(decodeValue("x", "1", safe)).toEqual(Either.left({ _tag: "UnknownModifierError", modifier: "x" }))
      expect(decodeValue("ix", "1", safe)).toEqual(Either.left({ _tag: "UnknownModifierError", modifier: "x" }))
    }))

  it.effect("refuses p in safe mode", () =>
    Effect.sync(() => {
      expect(decodeValue("64p", "AA==", safe)).toEqual(Either.left({ _tag: "UnsafeOperationError", operation: "p" }))
    }))

  it.effect("reports undecodable opaque payloads in unsafe mode", () =>
    Effect.sync(() => {
      const result = decodeValue("64p", "AA==", unsafe)
      expect(Either.isLeft(result) && result.left._tag).toBe("FormatError")
    }))
})
