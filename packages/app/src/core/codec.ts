import * as Encoding from "effect/Encoding"
import * as Either from "effect/Either"
import { base32 } from "rfc4648"

import type { DecodeError, UnsafeValueError } from "./errors.js"
import {
  encodingError,
  formatError,
  typeMismatchError,
  unknownModifierError,
  unsafeOperationError,
  unsafeValueError
} from "./errors.js"
import { formatLiteral, parseLiteral } from "./literal.js"
import { formatFloat, parseFloatText, parseIntegerText } from "./numeric.js"
import type { OpaqueSerializer } from "./opaque.js"
import type { ConfigValue } from "./value.js"
import { bytes, describeValue, float, int, isLiteralSafe, str } from "./value.js"

// CHANGE: implement the modifier-tag value codec
// WHY: every value is stored as (modifier, text payload) and decoded by applying modifier operations left to right
// QUOTE(TZ): "the modifier after the key says how to decode the value"
// REF: req-codec-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: encode(v) = Right(e) → decode(e.modifier, e.payload) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: encoded payloads never contain CR, LF or other control characters
// COMPLEXITY: O(n) where n = payload length

export interface CodecOptions {
  readonly safe: boolean
  readonly serializer: OpaqueSerializer
  readonly maxLiteralDepth: number
}

export interface Encoded {
  readonly modifier: string
  readonly payload: string
}

const utf8Encoder = new TextEncoder()
const utf8Decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * C0 controls, DEL and C1 controls.
 */
export const isControlCode = (code: number): boolean => code <= 0x1f || (code >= 0x7f && code <= 0x9f)

const isNamedWhitespace = (code: number): boolean => code === 0x09 || code === 0x0a || code === 0x0d

type StringClass = "plain" | "escapable" | "binary"

const classifyString = (value: string): StringClass => {
  let result: StringClass = "plain"
  for (let index = 0; index < value.length; index++) {
    const code = value.charCodeAt(index)
    if (!isControlCode(code)) {
      continue
    }
    if (!isNamedWhitespace(code)) {
      return "binary"
    }
    result = "escapable"
  }
  return result
}

const encodeString = (value: string): Encoded => {
  switch (classifyString(value)) {
    case "plain":
      return { modifier: "", payload: value }
    case "binary":
      return { modifier: "64s", payload: Encoding.encodeBase64(utf8Encoder.encode(value)) }
    case "escapable":
      return { modifier: "r", payload: formatLiteral(str(value)) }
  }
}

const encodeOpaque = (value: ConfigValue, options: CodecOptions): Either.Either<Encoded, UnsafeValueError> => {
  if (options.safe) {
    return Either.left(
      unsafeValueError(describeValue(value), "value is outside the literal closure and `safe` is enabled")
    )
  }
  return options.serializer.serialize(value).pipe(
    Either.map((payload) => ({ modifier: "64p", payload: Encoding.encodeBase64(payload) })),
    Either.mapLeft((reason) => unsafeValueError(describeValue(value), `${options.serializer.name}: ${reason}`))
  )
}

/**
 * Choose a modifier and payload for a value.
 *
 * @param value - Value to encode.
 * @param options - Safety flag and opaque serializer.
 * @returns Encoded pair, or UnsafeValueError when opaque serialization is required but disabled.
 *
 * @pure true
 * @invariant strings without control characters are stored verbatim with an empty modifier
 * @complexity O(n)
 */
export const encodeValue = (
  value: ConfigValue,
  options: CodecOptions
): Either.Either<Encoded, UnsafeValueError> => {
  switch (value._tag) {
    case "Str":
      return Either.right(encodeString(value.value))
    case "Bool":
    case "Null":
      return Either.right({ modifier: "r", payload: formatLiteral(value) })
    case "Int":
      return Either.right({ modifier: "i", payload: value.value.toString() })
    case "Float":
      return Either.right({ modifier: "f", payload: formatFloat(value.value) })
    case "Bytes":
      return Either.right({ modifier: "32", payload: base32.stringify(value.value) })
    case "Tuple":
    case "List":
    case "Set":
    case "Dict":
      return isLiteralSafe(value)
        ? Either.right({ modifier: "r", payload: formatLiteral(value) })
        : encodeOpaque(value, options)
    case "Opaque":
      return encodeOpaque(value, options)
  }
}

interface Step {
  readonly value: ConfigValue
  readonly width: number
}

type StepResult = Either.Either<Step, DecodeError>

const asBytes = (value: ConfigValue, operation: string): Either.Either<Uint8Array, DecodeError> => {
  if (value._tag === "Bytes") {
    return Either.right(value.value)
  }
  if (value._tag === "Str") {
    return Either.right(utf8Encoder.encode(value.value))
  }
  return Either.left(typeMismatchError(operation, value._tag))
}

const asString = (value: ConfigValue, operation: string): Either.Either<string, DecodeError> =>
  value._tag === "Str" ? Either.right(value.value) : Either.left(typeMismatchError(operation, value._tag))

/**
 * Text input for i, f and r: strings as they are, bytes decoded as UTF-8.
 */
const asText = (value: ConfigValue, operation: string): Either.Either<string, DecodeError> =>
  value._tag === "Bytes"
    ? Either.try({
      try: () => utf8Decoder.decode(value.value),
      catch: () => encodingError(operation, "payload is not valid UTF-8")
    })
    : asString(value, operation)

/**
 * Alphabet input for 32 and 64: bytes map one octet to one character, so
 * anything outside ASCII is left for the decoder to reject.
 */
const asAlphabet = (value: ConfigValue, operation: string): Either.Either<string, DecodeError> =>
  value._tag === "Bytes"
    ? Either.right(Array.from(value.value, (octet) => String.fromCharCode(octet)).join(""))
    : asString(value, operation)

const toStringValue = (value: ConfigValue): Either.Either<ConfigValue, DecodeError> => {
  if (value._tag === "Int") {
    return Either.right(str(value.value.toString()))
  }
  if (value._tag !== "Bytes") {
    return Either.left(typeMismatchError("s", value._tag))
  }
  return Either.try({
    try: () => str(utf8Decoder.decode(value.value)),
    catch: () => encodingError("s", "payload is not valid UTF-8")
  })
}

const decodeBase32 = (text: string): Either.Either<ConfigValue, DecodeError> =>
  Either.try({
    try: () => bytes(base32.parse(text)),
    catch: (error) => encodingError("32", error instanceof Error ? error.message : String(error))
  })

const decodeBase64 = (text: string): Either.Either<ConfigValue, DecodeError> =>
  Encoding.decodeBase64(text).pipe(
    Either.map(bytes),
    Either.mapLeft((error) => encodingError("64", error.message))
  )

const unpickle = (value: ConfigValue, options: CodecOptions): Either.Either<ConfigValue, DecodeError> => {
  if (options.safe) {
    return Either.left(unsafeOperationError("p"))
  }
  return asBytes(value, "p").pipe(
    Either.flatMap((payload) =>
      options.serializer.deserialize(payload).pipe(
        Either.mapLeft((reason) => formatError("p", `${options.serializer.name}: ${reason}`))
      )
    )
  )
}

const step = (width: number, result: Either.Either<ConfigValue, DecodeError>): StepResult =>
  Either.map(result, (next) => ({ value: next, width }))

const applyOperation = (modifier: string, value: ConfigValue, options: CodecOptions): StepResult => {
  if (modifier.startsWith("32")) {
    return step(2, Either.flatMap(asAlphabet(value, "32"), decodeBase32))
  }
  if (modifier.startsWith("64")) {
    return step(2, Either.flatMap(asAlphabet(value, "64"), decodeBase64))
  }
  switch (modifier.charAt(0)) {
    case "p":
      return step(1, unpickle(value, options))
    case "s":
      return step(1, toStringValue(value))
    case "b":
      return step(1, Either.map(asString(value, "b"), (text) => bytes(utf8Encoder.encode(text))))
    case "i":
      return step(
        1,
        Either.flatMap(asText(value, "i"), (text) => Either.map(parseIntegerText(text), int))
      )
    case "f":
      return step(
        1,
        Either.flatMap(asText(value, "f"), (text) => Either.map(parseFloatText(text), float))
      )
    case "r":
      return step(
        1,
        Either.flatMap(asText(value, "r"), (text): Either.Either<ConfigValue, DecodeError> =>
          parseLiteral(text, options.maxLiteralDepth))
      )
    default:
      return Either.left(unknownModifierError(modifier))
  }
}

/**
 * Apply a modifier chain to a payload, left to right.
 *
 * @param modifier - Operation chain such as "", "i", "64s", "64p"; continuation markers are handled by the reader.
 * @param payload - Raw text after "=".
 * @param options - Safety flag, opaque serializer and literal depth limit.
 * @returns Decoded value or the first DecodeError met.
 *
 * @pure true
 * @invariant the empty modifier yields the payload as a string
 * @complexity O(n)
 */
export const decodeValue = (
  modifier: string,
  payload: string,
  options: CodecOptions
): Either.Either<ConfigValue, DecodeError> => {
  let value: ConfigValue = str(payload)
  let remaining = modifier
  while (remaining.length > 0) {
    const applied = applyOperation(remaining, value, options)
    if (Either.isLeft(applied)) {
      return Either.left(applied.left)
    }
    value = applied.right.value
    remaining = remaining.slice(applied.right.width)
  }
  return Either.right(value)
}
