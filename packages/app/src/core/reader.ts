import * as Either from "effect/Either"

import { decodeValue } from "./codec.js"
import type { ReadOptions } from "./config.js"
import type { UnexpectedEndOfInput } from "./errors.js"
import { unexpectedEndOfInput } from "./errors.js"
import { stripTerminator } from "./lines.js"
import type { Diagnostic, ReadResult, StructureEntry } from "./types.js"
import { invalidLine, keyLine, verbatim } from "./types.js"
import type { ConfigValue } from "./value.js"

// CHANGE: parse a line source into a mapping plus structure entries
// WHY: malformed content must never abort a read; only a truncated continuation is fatal
// QUOTE(TZ): "a bad line must not stop the rest of the file from loading"
// REF: req-reader-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ls: read(ls) = Right(r) → |r.structure| = number of logical lines in ls
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a key maps to the value of its last successfully decoded line
// COMPLEXITY: O(n) where n = total input length

interface LineCursor {
  readonly next: () => string | undefined
  readonly lineNumber: () => number
}

const cursorOf = (source: Iterable<string>): LineCursor => {
  const iterator = source[Symbol.iterator]()
  let count = 0
  return {
    next: () => {
      const step = iterator.next()
      if (step.done === true) {
        return undefined
      }
      count += 1
      return step.value
    },
    lineNumber: () => count
  }
}

interface Assembled {
  readonly payload: string
  readonly raw: string
  readonly modifier: string
}

type Continuation =
  | { readonly _tag: "Done"; readonly assembled: Assembled }
  | { readonly _tag: "Truncated"; readonly raw: string }

/**
 * Undo "C<marker>" prefixes: while the payload ends with the marker,
 * drop it and append the next physical line.
 */
const assemble = (
  cursor: LineCursor,
  key: string,
  modifier: string,
  payload: string,
  raw: string
): Either.Either<Continuation, UnexpectedEndOfInput> => {
  let current: Assembled = { payload, raw, modifier }
  while (current.modifier.startsWith("C")) {
    const code = current.modifier.codePointAt(1)
    if (code === undefined) {
      return Either.right({ _tag: "Truncated", raw: current.raw })
    }
    const marker = String.fromCodePoint(code)
    let text = current.payload
    let collected = current.raw
    const start = cursor.lineNumber()
    while (text.endsWith(marker)) {
      const line = cursor.next()
      if (line === undefined) {
        return Either.left(unexpectedEndOfInput(start, key, marker))
      }
      collected += line
      text = text.slice(0, text.length - marker.length) + stripTerminator(line)
    }
    current = { payload: text, raw: collected, modifier: current.modifier.slice(1 + marker.length) }
  }
  return Either.right({ _tag: "Done", assembled: current })
}

const isVerbatim = (stripped: string): boolean => {
  const trimmed = stripped.trim()
  return trimmed.length === 0 || trimmed.startsWith("#")
}

const splitKey = (keyPart: string): { readonly key: string; readonly modifier: string } => {
  const slash = keyPart.indexOf("/")
  return slash === -1
    ? { key: keyPart, modifier: "" }
    : { key: keyPart.slice(0, slash), modifier: keyPart.slice(slash + 1) }
}

/**
 * Parse configuration lines.
 *
 * @param source - Lines with or without terminators; the iterator is pulled for continuations.
 * @param options - Safety flag, opaque serializer and literal depth limit.
 * @returns Values, structure and diagnostics, or UnexpectedEndOfInput when a continuation is cut short.
 *
 * @pure true
 * @invariant undecodable lines become Invalid entries and never reach values
 * @complexity O(n)
 */
export const readConfigLines = (
  source: Iterable<string>,
  options: ReadOptions
): Either.Either<ReadResult, UnexpectedEndOfInput> => {
  const cursor = cursorOf(source)
  const values = new Map<string, ConfigValue>()
  const structure: Array<StructureEntry> = []
  const diagnostics: Array<Diagnostic> = []
  const malformed = (line: number, raw: string, text: string, reason: string): void => {
    structure.push(invalidLine(raw))
    diagnostics.push({ type: "malformed-line", line, text, reason })
  }

  for (let raw = cursor.next(); raw !== undefined; raw = cursor.next()) {
    const lineNumber = cursor.lineNumber()
    const stripped = stripTerminator(raw)
    if (isVerbatim(stripped)) {
      structure.push(verbatim(raw))
      continue
    }
    const equals = stripped.indexOf("=")
    if (equals === -1) {
      malformed(lineNumber, raw, stripped, "missing \"=\"")
      continue
    }
    const { key, modifier } = splitKey(stripped.slice(0, equals))
    if (key.length === 0) {
      malformed(lineNumber, raw, stripped, "empty key")
      continue
    }
    const continued = assemble(cursor, key, modifier, stripped.slice(equals + 1), raw)
    if (Either.isLeft(continued)) {
      return Either.left(continued.left)
    }
    if (continued.right._tag === "Truncated") {
      malformed(lineNumber, continued.right.raw, stripped, "continuation marker without a character")
      continue
    }
    const assembled = continued.right.assembled
    const decoded = decodeValue(assembled.modifier, assembled.payload, options)
    if (Either.isLeft(decoded)) {
      structure.push(invalidLine(assembled.raw))
      diagnostics.push({ type: "decode-failed", line: lineNumber, key, error: decoded.left })
      continue
    }
    values.set(key, decoded.right)
    structure.push(keyLine(key, assembled.raw))
  }

  return Either.right({ values, structure, diagnostics })
}
