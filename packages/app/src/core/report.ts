import { Match } from "effect"

import type { AppError, DecodeError } from "./errors.js"
import { formatLiteral } from "./literal.js"
import type { Diagnostic } from "./types.js"
import type { ConfigValue } from "./value.js"
import { isLiteralSafe } from "./value.js"

// CHANGE: render diagnostics, errors and values as human-readable text
// WHY: keep message wording pure and deterministic across the shell and the CLI
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: renderDiagnostic(d) starts with "[" + d.type + "]"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rendered text is a single line except for multi-line parse errors
// COMPLEXITY: O(n)

/**
 * Describe a per-line decode failure.
 *
 * @pure true
 * @complexity O(1)
 */
export const renderDecodeError = (error: DecodeError): string =>
  Match.value(error).pipe(
    Match.tag("UnsafeOperationError", (value) => `operation "${value.operation}" needs unsafe mode`),
    Match.tag("FormatError", (value) => `${value.operation}: ${value.message}`),
    Match.tag("EncodingError", (value) => `${value.operation}: ${value.message}`),
    Match.tag("TypeMismatchError", (value) => `${value.operation}: cannot apply to ${value.actual}`),
    Match.tag("UnknownModifierError", (value) => `unknown modifier "${value.modifier}"`),
    Match.exhaustive
  )

export const renderDiagnostic = (diagnostic: Diagnostic): string =>
  Match.value(diagnostic).pipe(
    Match.when(
      { type: "malformed-line" },
      (value) => `[malformed-line] line ${value.line}: ${value.reason}: ${JSON.stringify(value.text)}`
    ),
    Match.when(
      { type: "decode-failed" },
      (value) => `[decode-failed] line ${value.line} key ${value.key}: ${renderDecodeError(value.error)}`
    ),
    Match.when({ type: "unsplittable" }, (value) => `[unsplittable] key ${value.key}: no continuation character left`),
    Match.exhaustive
  )

/**
 * Render an application error for stderr.
 *
 * @pure true
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("UnsafeValueError", (value) =>
      value.key === undefined
        ? `cannot write ${value.valueType}: ${value.reason}`
        : `cannot write key ${value.key} (${value.valueType}): ${value.reason}`),
    Match.tag("InvalidKeyError", (value) => `invalid key ${JSON.stringify(value.key)}: ${value.reason}`),
    Match.tag(
      "UnexpectedEndOfInput",
      (value) => `line ${value.line} key ${value.key}: input ended inside a "${value.marker}" continuation`
    ),
    Match.tag("FileError", (value) => value.message),
    Match.tag("KeyNotFound", (value) => `key ${value.key} not found in ${value.file}`),
    Match.tag(
      "OpaqueEntriesError",
      (value) =>
        `${value.file} has entries that can only be read with --unsafe (${
          value.keys.join(", ")
        }); rewriting it would drop them`
    ),
    Match.exhaustive
  )

/**
 * Text printed by `get`: strings raw, literal-safe values in literal syntax.
 *
 * @pure true
 * @invariant values outside the literal closure print as "<opaque>"
 * @complexity O(n)
 */
export const displayValue = (value: ConfigValue): string => {
  if (value._tag === "Str") {
    return value.value
  }
  return isLiteralSafe(value) ? formatLiteral(value) : "<opaque>"
}
