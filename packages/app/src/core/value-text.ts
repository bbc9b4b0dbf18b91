import { Match } from "effect"
import * as Either from "effect/Either"

import type { CliError, ValueType } from "./cli.js"
import { cliError } from "./cli.js"
import type { FormatError } from "./errors.js"
import { parseLiteral } from "./literal.js"
import { parseFloatText, parseIntegerText } from "./numeric.js"
import type { ConfigValue } from "./value.js"
import { bool, bytes, float, int, nullValue, str } from "./value.js"

// CHANGE: turn command line text into a typed value
// WHY: `set --type` decides how the shell argument is interpreted
// REF: req-cli-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,ty: parseValueText(ty, t) = Right(v) → tag(v) matches ty (literal: any LiteralValue)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: str never fails
// COMPLEXITY: O(n)

const fromFormat = (kind: ValueType) => (error: FormatError): CliError =>
  cliError(`Invalid ${kind} value: ${error.message}`)

const parseBool = (text: string): Either.Either<ConfigValue, CliError> => {
  const lowered = text.trim().toLowerCase()
  if (lowered === "true" || lowered === "1") {
    return Either.right(bool(true))
  }
  if (lowered === "false" || lowered === "0") {
    return Either.right(bool(false))
  }
  return Either.left(cliError(`Invalid bool value: ${text}`))
}

const parseNull = (text: string): Either.Either<ConfigValue, CliError> => {
  const trimmed = text.trim()
  return trimmed === "" || trimmed === "null" || trimmed === "None"
    ? Either.right(nullValue)
    : Either.left(cliError(`Invalid null value: ${text}`))
}

/**
 * Interpret CLI text according to a declared type.
 *
 * @param valueType - Declared type from --type.
 * @param text - Raw argument.
 * @returns Typed value or CliError.
 *
 * @pure true
 * @invariant bytes are the UTF-8 encoding of the text
 * @complexity O(n)
 */
export const parseValueText = (valueType: ValueType, text: string): Either.Either<ConfigValue, CliError> =>
  Match.value(valueType).pipe(
    Match.when("str", (): Either.Either<ConfigValue, CliError> => Either.right(str(text))),
    Match.when("int", () => parseIntegerText(text).pipe(Either.map(int), Either.mapLeft(fromFormat("int")))),
    Match.when("float", () => parseFloatText(text).pipe(Either.map(float), Either.mapLeft(fromFormat("float")))),
    Match.when("bool", () => parseBool(text)),
    Match.when("null", () => parseNull(text)),
    Match.when("bytes", () => Either.right(bytes(new TextEncoder().encode(text)))),
    Match.when("literal", () => parseLiteral(text).pipe(Either.mapLeft(fromFormat("literal")))),
    Match.exhaustive
  )
