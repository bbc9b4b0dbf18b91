import * as Either from "effect/Either"

import type { FormatError } from "./errors.js"
import { formatError } from "./errors.js"

// CHANGE: centralize numeric text rules shared by the i/f modifiers and the literal grammar
// WHY: integers and floats must print and parse identically everywhere they appear
// QUOTE(TZ): "integers are arbitrary precision, floats print so they read back exactly"
// REF: req-numeric-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n ∈ Float: parseFloatText(formatFloat(n)) = Right(n) (NaN compared by identity of kind)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: formatted floats are always distinguishable from integers
// COMPLEXITY: O(n)/O(1)

const INTEGER_TEXT = /^[+-]?\d+(?:_\d+)*$/u
const FLOAT_TEXT = /^[+-]?(?:\d+(?:_\d+)*(?:\.(?:\d+(?:_\d+)*)?)?|\.\d+(?:_\d+)*)(?:[eE][+-]?\d+(?:_\d+)*)?$/u
const INFINITY_TEXT = /^[+-]?inf(?:inity)?$/iu
const NAN_TEXT = /^[+-]?nan$/iu

/**
 * Render a float as the shortest round-trip decimal.
 *
 * @param value - Finite or non-finite double.
 * @returns Text such as "1.5", "3.0", "1e+21", "-0.0", "inf", "nan".
 *
 * @pure true
 * @invariant integral values carry a ".0" suffix
 * @complexity O(1)
 */
export const formatFloat = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (value === Number.POSITIVE_INFINITY) {
    return "inf"
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return "-inf"
  }
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  const text = String(value)
  return /^-?\d+$/u.test(text) ? `${text}.0` : text
}

/**
 * Parse decimal integer text into a bigint.
 *
 * @pure true
 * @invariant surrounding whitespace is ignored, "_" separators are dropped
 * @complexity O(n)
 */
export const parseIntegerText = (text: string, operation = "i"): Either.Either<bigint, FormatError> => {
  const trimmed = text.trim()
  if (!INTEGER_TEXT.test(trimmed)) {
    return Either.left(formatError(operation, `invalid integer: ${JSON.stringify(text)}`))
  }
  const negative = trimmed.startsWith("-")
  const digits = trimmed.replace(/^[+-]/u, "").replaceAll("_", "")
  const magnitude = BigInt(digits)
  return Either.right(negative ? -magnitude : magnitude)
}

/**
 * Parse float text, including inf/infinity/nan spellings.
 *
 * @pure true
 * @invariant "-0.0" parses to negative zero
 * @complexity O(n)
 */
export const parseFloatText = (text: string, operation = "f"): Either.Either<number, FormatError> => {
  const trimmed = text.trim()
  if (INFINITY_TEXT.test(trimmed)) {
    return Either.right(trimmed.startsWith("-") ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY)
  }
  if (NAN_TEXT.test(trimmed)) {
    return Either.right(Number.NaN)
  }
  if (!FLOAT_TEXT.test(trimmed)) {
    return Either.left(formatError(operation, `invalid float: ${JSON.stringify(text)}`))
  }
  return Either.right(Number(trimmed.replaceAll("_", "")))
}
