import * as Either from "effect/Either"

import type { FormatError } from "./errors.js"
import { formatError } from "./errors.js"
import { parseFloatText, parseIntegerText } from "./numeric.js"

// CHANGE: tokenize the restricted literal syntax used by the r modifier
// WHY: a closed token set is what keeps literal decoding free of executable expressions
// QUOTE(TZ): "literal values are parsed, never evaluated"
// REF: req-literal-lexer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: tokenize(s) = Right(ts) → last(ts).kind = "Eof"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: identifiers outside {True, False, None, set, inf, nan} are rejected
// COMPLEXITY: O(n) where n = input length

export type TokenKind =
  | "LParen"
  | "RParen"
  | "LBracket"
  | "RBracket"
  | "LBrace"
  | "RBrace"
  | "Colon"
  | "Comma"
  | "Plus"
  | "Minus"
  | "Eof"

export type Token =
  | { readonly kind: TokenKind; readonly offset: number }
  | { readonly kind: "String"; readonly offset: number; readonly value: string }
  | { readonly kind: "Bytes"; readonly offset: number; readonly value: Uint8Array }
  | { readonly kind: "Integer"; readonly offset: number; readonly value: bigint }
  | { readonly kind: "Float"; readonly offset: number; readonly value: number }
  | { readonly kind: "Keyword"; readonly offset: number; readonly value: Keyword }

export type Keyword = "True" | "False" | "None" | "set" | "inf" | "nan"

const KEYWORDS: ReadonlySet<string> = new Set<Keyword>(["True", "False", "None", "set", "inf", "nan"])

const isKeyword = (word: string): word is Keyword => KEYWORDS.has(word)

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  "(": "LParen",
  ")": "RParen",
  "[": "LBracket",
  "]": "RBracket",
  "{": "LBrace",
  "}": "RBrace",
  ":": "Colon",
  ",": "Comma",
  "+": "Plus",
  "-": "Minus"
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\",
  "'": "'",
  "\"": "\"",
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v"
}

const WHITESPACE = /[ \t\r\n\f\v]/u
const DIGIT = /\d/u
const WORD_START = /[A-Za-z_]/u
const WORD_PART = /\w/u
const NUMBER_PART = /[\w.]/u
const HEX = /^[\da-fA-F]+$/u
const OCTAL = /[0-7]/u

interface Scanned<A> {
  readonly value: A
  readonly next: number
}

type Scan<A> = Either.Either<Scanned<A>, FormatError>

const fail = <A>(offset: number, message: string): Scan<A> =>
  Either.left(formatError("r", `${message} at offset ${offset}`))

const readHexEscape = (input: string, index: number, width: number): Scan<number> => {
  const digits = input.slice(index, index + width)
  if (digits.length !== width || !HEX.test(digits)) {
    return fail(index, `truncated \\x, \\u or \\U escape`)
  }
  return Either.right({ value: Number.parseInt(digits, 16), next: index + width })
}

const readOctalEscape = (input: string, index: number): Scanned<number> => {
  let end = index
  while (end < index + 3 && OCTAL.test(input.charAt(end))) {
    end += 1
  }
  return { value: Number.parseInt(input.slice(index, end), 8), next: end }
}

/**
 * Read one escape sequence; index points just past the backslash.
 * Unknown escapes keep their backslash, as the source grammar does.
 */
const readEscape = (input: string, index: number, isBytes: boolean): Scan<ReadonlyArray<number>> => {
  const char = input.charAt(index)
  if (char.length === 0) {
    return fail(index, "unterminated escape")
  }
  const simple = SIMPLE_ESCAPES[char]
  if (simple !== undefined) {
    return Either.right({ value: [simple.charCodeAt(0)], next: index + 1 })
  }
  if (OCTAL.test(char)) {
    const octal = readOctalEscape(input, index)
    if (isBytes && octal.value > 0xff) {
      return fail(index, "octal escape outside the byte range")
    }
    return Either.right({ value: [octal.value], next: octal.next })
  }
  if (char === "x") {
    return Either.map(readHexEscape(input, index + 1, 2), (hex) => ({ value: [hex.value], next: hex.next }))
  }
  if (!isBytes && (char === "u" || char === "U")) {
    const scanned = readHexEscape(input, index + 1, char === "u" ? 4 : 8)
    if (Either.isRight(scanned) && scanned.right.value > 0x10ffff) {
      return fail(index, "escape outside the Unicode range")
    }
    return Either.map(scanned, (hex) => ({ value: [hex.value], next: hex.next }))
  }
  return Either.right({ value: ["\\".charCodeAt(0), char.charCodeAt(0)], next: index + 1 })
}

/**
 * Read a quoted string or bytes literal; index points at the opening quote.
 * String escapes produce code points, bytes escapes produce octets.
 */
const readQuoted = (input: string, index: number, isBytes: boolean): Scan<ReadonlyArray<number>> => {
  const quote = input.charAt(index)
  const units: Array<number> = []
  let cursor = index + 1
  while (cursor < input.length) {
    const char = input.charAt(cursor)
    if (char === quote) {
      return Either.right({ value: units, next: cursor + 1 })
    }
    if (char === "\n" || char === "\r") {
      return fail(cursor, "line break inside quoted literal")
    }
    if (char === "\\") {
      const escaped = readEscape(input, cursor + 1, isBytes)
      if (Either.isLeft(escaped)) {
        return Either.left(escaped.left)
      }
      units.push(...escaped.right.value)
      cursor = escaped.right.next
      continue
    }
    const codePoint = input.codePointAt(cursor) ?? 0
    if (isBytes && codePoint > 0x7f) {
      return fail(cursor, "bytes literal may only contain ASCII characters")
    }
    units.push(codePoint)
    cursor += codePoint > 0xffff ? 2 : 1
  }
  return fail(index, "unterminated quoted literal")
}

const readNumber = (input: string, index: number): Scan<Token> => {
  let end = index
  while (end < input.length) {
    const char = input.charAt(end)
    const previous = input.charAt(end - 1)
    const signedExponent = (char === "+" || char === "-") && (previous === "e" || previous === "E") &&
      !/^0[xob]/iu.test(input.slice(index, end))
    if (!NUMBER_PART.test(char) && !signedExponent) {
      break
    }
    end += 1
  }
  const text = input.slice(index, end)
  if (/^0[xob]/iu.test(text)) {
    if (!/^0(?:[xX]_?[\da-fA-F]+(?:_[\da-fA-F]+)*|[oO]_?[0-7]+(?:_[0-7]+)*|[bB]_?[01]+(?:_[01]+)*)$/u.test(text)) {
      return fail(index, `invalid number ${JSON.stringify(text)}`)
    }
    return Either.right({
      value: { kind: "Integer", offset: index, value: BigInt(text.replaceAll("_", "")) },
      next: end
    })
  }
  const integer = parseIntegerText(text, "r")
  if (Either.isRight(integer)) {
    return Either.right({ value: { kind: "Integer", offset: index, value: integer.right }, next: end })
  }
  const floating = parseFloatText(text, "r")
  if (!/[.eE]/u.test(text) || Either.isLeft(floating)) {
    return fail(index, `invalid number ${JSON.stringify(text)}`)
  }
  return Either.right({ value: { kind: "Float", offset: index, value: floating.right }, next: end })
}

const readWord = (input: string, index: number): Scan<Token> => {
  let end = index
  while (end < input.length && WORD_PART.test(input.charAt(end))) {
    end += 1
  }
  const word = input.slice(index, end)
  const quote = input.charAt(end)
  if ((word === "b" || word === "B") && (quote === "'" || quote === "\"")) {
    return Either.map(readQuoted(input, end, true), (scanned) => ({
      value: { kind: "Bytes", offset: index, value: Uint8Array.from(scanned.value) },
      next: scanned.next
    }))
  }
  if (!isKeyword(word)) {
    return fail(index, `name ${JSON.stringify(word)} is not a literal`)
  }
  return Either.right({ value: { kind: "Keyword", offset: index, value: word }, next: end })
}

const CHUNK = 4096

const fromCodePoints = (points: ReadonlyArray<number>): string => {
  let text = ""
  for (let start = 0; start < points.length; start += CHUNK) {
    text += String.fromCodePoint(...points.slice(start, start + CHUNK))
  }
  return text
}

const readString = (input: string, index: number): Scan<Token> =>
  Either.map(readQuoted(input, index, false), (scanned) => ({
    value: { kind: "String", offset: index, value: fromCodePoints(scanned.value) },
    next: scanned.next
  }))

const readToken = (input: string, index: number): Scan<Token> => {
  const char = input.charAt(index)
  const punctuation = PUNCTUATION[char]
  if (punctuation !== undefined) {
    return Either.right({ value: { kind: punctuation, offset: index }, next: index + 1 })
  }
  if (char === "'" || char === "\"") {
    return readString(input, index)
  }
  if (DIGIT.test(char) || (char === "." && DIGIT.test(input.charAt(index + 1)))) {
    return readNumber(input, index)
  }
  if (WORD_START.test(char)) {
    return readWord(input, index)
  }
  return fail(index, `unexpected character ${JSON.stringify(char)}`)
}

/**
 * Split literal text into tokens.
 *
 * @param input - Literal text, e.g. "[1, 'two', (3.0,)]".
 * @returns Token list terminated by Eof, or a FormatError for the first bad character.
 *
 * @pure true
 * @invariant tokens are ordered by offset
 * @complexity O(n)
 */
export const tokenize = (input: string): Either.Either<ReadonlyArray<Token>, FormatError> => {
  const tokens: Array<Token> = []
  let index = 0
  while (index < input.length) {
    if (WHITESPACE.test(input.charAt(index))) {
      index += 1
      continue
    }
    const scanned = readToken(input, index)
    if (Either.isLeft(scanned)) {
      return Either.left(scanned.left)
    }
    tokens.push(scanned.right.value)
    index = scanned.right.next
  }
  tokens.push({ kind: "Eof", offset: input.length })
  return Either.right(tokens)
}
