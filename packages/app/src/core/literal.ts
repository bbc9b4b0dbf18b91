import * as Either from "effect/Either"

import type { FormatError } from "./errors.js"
import { formatError } from "./errors.js"
import type { Keyword, Token } from "./literal-lexer.js"
import { tokenize } from "./literal-lexer.js"
import { formatFloat } from "./numeric.js"
import type { LiteralValue } from "./value.js"
import { bool, bytes, dict, float, int, isHashable, list, nullValue, set, str, tuple } from "./value.js"

// CHANGE: parse and print the restricted literal syntax (modifier r)
// WHY: containers of primitives round-trip as readable text without executing anything
// QUOTE(TZ): "literal values are parsed, never evaluated"
// REF: req-literal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ LiteralValue: parseLiteral(formatLiteral(v)) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: set items and dict keys of a parsed value are hashable
// COMPLEXITY: O(n) where n = number of tokens

export const DEFAULT_MAX_LITERAL_DEPTH = 100

type Parsed = Either.Either<{ readonly value: LiteralValue; readonly next: number }, FormatError>

const failAt = (token: Token, message: string): Parsed =>
  Either.left(formatError("r", `${message} at offset ${token.offset}`))

const describeToken = (token: Token): string => token.kind === "Keyword" ? token.value : token.kind

const keywordValue = (keyword: Keyword): LiteralValue | undefined => {
  switch (keyword) {
    case "True":
      return bool(true)
    case "False":
      return bool(false)
    case "None":
      return nullValue
    case "inf":
      return float(Number.POSITIVE_INFINITY)
    case "nan":
      return float(Number.NaN)
    case "set":
      return undefined
  }
}

const identityKey = (value: LiteralValue): string => `${value._tag}:${formatLiteral(value)}`

const dedupeItems = (items: ReadonlyArray<LiteralValue>): ReadonlyArray<LiteralValue> => {
  const seen = new Map<string, LiteralValue>()
  for (const item of items) {
    const key = identityKey(item)
    if (!seen.has(key)) {
      seen.set(key, item)
    }
  }
  return [...seen.values()]
}

const dedupeEntries = (
  entries: ReadonlyArray<readonly [LiteralValue, LiteralValue]>
): ReadonlyArray<readonly [LiteralValue, LiteralValue]> => {
  const seen = new Map<string, readonly [LiteralValue, LiteralValue]>()
  for (const entry of entries) {
    const key = identityKey(entry[0])
    const existing = seen.get(key)
    seen.set(key, existing === undefined ? entry : [existing[0], entry[1]])
  }
  return [...seen.values()]
}

class LiteralParser {
  constructor(
    private readonly tokens: ReadonlyArray<Token>,
    private readonly maxDepth: number
  ) {}

  at(index: number): Token {
    return this.tokens[index] ?? { kind: "Eof", offset: -1 }
  }

  /**
   * Parse a comma-separated sequence until the closing token.
   * Reports whether a comma was seen, which distinguishes (x) from (x,).
   */
  sequence(
    start: number,
    close: Token["kind"],
    depth: number
  ): Either.Either<
    { readonly items: ReadonlyArray<LiteralValue>; readonly sawComma: boolean; readonly next: number },
    FormatError
  > {
    const items: Array<LiteralValue> = []
    let index = start
    let sawComma = false
    while (this.at(index).kind !== close) {
      const parsed = this.value(index, depth + 1)
      if (Either.isLeft(parsed)) {
        return Either.left(parsed.left)
      }
      items.push(parsed.right.value)
      index = parsed.right.next
      const separator = this.at(index)
      if (separator.kind === "Comma") {
        sawComma = true
        index += 1
        continue
      }
      if (separator.kind !== close) {
        return Either.left(formatError("r", `expected ',' or closing bracket at offset ${separator.offset}`))
      }
    }
    return Either.right({ items, sawComma, next: index + 1 })
  }

  parenthesized(start: number, depth: number): Parsed {
    const parsed = this.sequence(start + 1, "RParen", depth)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    const { items, next, sawComma } = parsed.right
    const only = items[0]
    if (items.length === 1 && !sawComma && only !== undefined) {
      return Either.right({ value: only, next })
    }
    return Either.right({ value: tuple(items), next })
  }

  bracketed(start: number, depth: number): Parsed {
    return Either.map(this.sequence(start + 1, "RBracket", depth), (parsed) => ({
      value: list(parsed.items),
      next: parsed.next
    }))
  }

  braced(start: number, depth: number): Parsed {
    if (this.at(start + 1).kind === "RBrace") {
      return Either.right({ value: dict<LiteralValue>([]), next: start + 2 })
    }
    const first = this.value(start + 1, depth + 1)
    if (Either.isLeft(first)) {
      return first
    }
    if (this.at(first.right.next).kind === "Colon") {
      return this.dictionary(start, depth)
    }
    const parsed = this.sequence(start + 1, "RBrace", depth)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    const unhashable = parsed.right.items.find((item) => !isHashable(item))
    if (unhashable !== undefined) {
      return failAt(this.at(start), `unhashable set item ${unhashable._tag}`)
    }
    return Either.right({ value: set(dedupeItems(parsed.right.items)), next: parsed.right.next })
  }

  dictionary(start: number, depth: number): Parsed {
    const entries: Array<readonly [LiteralValue, LiteralValue]> = []
    let index = start + 1
    while (this.at(index).kind !== "RBrace") {
      const key = this.value(index, depth + 1)
      if (Either.isLeft(key)) {
        return key
      }
      if (!isHashable(key.right.value)) {
        return failAt(this.at(index), `unhashable dict key ${key.right.value._tag}`)
      }
      const colon = this.at(key.right.next)
      if (colon.kind !== "Colon") {
        return failAt(colon, "expected ':'")
      }
      const entry = this.value(key.right.next + 1, depth + 1)
      if (Either.isLeft(entry)) {
        return entry
      }
      entries.push([key.right.value, entry.right.value])
      index = entry.right.next
      const separator = this.at(index)
      if (separator.kind === "Comma") {
        index += 1
      } else if (separator.kind !== "RBrace") {
        return failAt(separator, "expected ',' or '}'")
      }
    }
    return Either.right({ value: dict(dedupeEntries(entries)), next: index + 1 })
  }

  signed(start: number, negative: boolean): Parsed {
    const operand = this.at(start + 1)
    if (operand.kind === "Integer") {
      return Either.right({ value: int(negative ? -operand.value : operand.value), next: start + 2 })
    }
    if (operand.kind === "Float") {
      return Either.right({ value: float(negative ? -operand.value : operand.value), next: start + 2 })
    }
    if (operand.kind === "Keyword" && (operand.value === "inf" || operand.value === "nan")) {
      const magnitude = operand.value === "inf" ? Number.POSITIVE_INFINITY : Number.NaN
      return Either.right({ value: float(negative ? -magnitude : magnitude), next: start + 2 })
    }
    return failAt(operand, "expected a number after sign")
  }

  keyword(start: number, keyword: Keyword): Parsed {
    const value = keywordValue(keyword)
    if (value !== undefined) {
      return Either.right({ value, next: start + 1 })
    }
    if (this.at(start + 1).kind === "LParen" && this.at(start + 2).kind === "RParen") {
      return Either.right({ value: set<LiteralValue>([]), next: start + 3 })
    }
    return failAt(this.at(start), "only set() is allowed as a call")
  }

  value(start: number, depth: number): Parsed {
    const token = this.at(start)
    if (depth > this.maxDepth) {
      return failAt(token, `nesting deeper than ${this.maxDepth}`)
    }
    switch (token.kind) {
      case "String":
        return Either.right({ value: str(token.value), next: start + 1 })
      case "Bytes":
        return Either.right({ value: bytes(token.value), next: start + 1 })
      case "Integer":
        return Either.right({ value: int(token.value), next: start + 1 })
      case "Float":
        return Either.right({ value: float(token.value), next: start + 1 })
      case "Keyword":
        return this.keyword(start, token.value)
      case "Minus":
        return this.signed(start, true)
      case "Plus":
        return this.signed(start, false)
      case "LParen":
        return this.parenthesized(start, depth)
      case "LBracket":
        return this.bracketed(start, depth)
      case "LBrace":
        return this.braced(start, depth)
      default:
        return failAt(token, `unexpected ${describeToken(token)}`)
    }
  }

  /** Top level: a single value, or a bare comma-separated tuple. */
  document(): Parsed {
    const first = this.value(0, 0)
    if (Either.isLeft(first)) {
      return first
    }
    if (this.at(first.right.next).kind !== "Comma") {
      return first
    }
    const rest = this.sequence(first.right.next + 1, "Eof", 0)
    if (Either.isLeft(rest)) {
      return Either.left(rest.left)
    }
    return Either.right({ value: tuple([first.right.value, ...rest.right.items]), next: rest.right.next - 1 })
  }
}

/**
 * Parse literal text into a value.
 *
 * @param text - Literal syntax, e.g. "{'a': (1, 2.0), 'b': [True, None]}".
 * @param maxDepth - Maximum container nesting.
 * @returns LiteralValue or FormatError for anything outside the grammar.
 *
 * @pure true
 * @invariant never evaluates names other than True, False, None, set(), inf, nan
 * @complexity O(n)
 */
export const parseLiteral = (
  text: string,
  maxDepth: number = DEFAULT_MAX_LITERAL_DEPTH
): Either.Either<LiteralValue, FormatError> => {
  const tokens = tokenize(text)
  if (Either.isLeft(tokens)) {
    return Either.left(tokens.left)
  }
  const parser = new LiteralParser(tokens.right, maxDepth)
  const parsed = parser.document()
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const trailing = parser.at(parsed.right.next)
  if (trailing.kind !== "Eof") {
    return Either.left(formatError("r", `unexpected ${describeToken(trailing)} at offset ${trailing.offset}`))
  }
  return Either.right(parsed.right.value)
}

const hex2 = (code: number): string => code.toString(16).padStart(2, "0")

const chooseQuote = (hasSingle: boolean, hasDouble: boolean): string => hasSingle && !hasDouble ? "\"" : "'"

const escapeControl = (code: number): string | undefined => {
  if (code === 0x09) {
    return "\\t"
  }
  if (code === 0x0a) {
    return "\\n"
  }
  if (code === 0x0d) {
    return "\\r"
  }
  if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) {
    return `\\x${hex2(code)}`
  }
  return undefined
}

/**
 * Quote a string in literal syntax.
 *
 * @pure true
 * @invariant output contains no control characters
 * @complexity O(n)
 */
export const quoteString = (value: string): string => {
  const quote = chooseQuote(value.includes("'"), value.includes("\""))
  let body = ""
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0
    if (char === "\\" || char === quote) {
      body += `\\${char}`
      continue
    }
    body += escapeControl(code) ?? char
  }
  return quote + body + quote
}

const SINGLE_QUOTE = 0x27
const DOUBLE_QUOTE = 0x22
const BACKSLASH = 0x5c

export const quoteBytes = (value: Uint8Array): string => {
  const quote = chooseQuote(value.includes(SINGLE_QUOTE), value.includes(DOUBLE_QUOTE))
  let body = ""
  for (const octet of value) {
    const char = String.fromCharCode(octet)
    if (octet === BACKSLASH || char === quote) {
      body += `\\${char}`
      continue
    }
    body += octet >= 0x80 ? `\\x${hex2(octet)}` : escapeControl(octet) ?? char
  }
  return `b${quote}${body}${quote}`
}

const joinItems = (items: ReadonlyArray<LiteralValue>): string => items.map(formatLiteral).join(", ")

/**
 * Print a value in literal syntax.
 *
 * @param value - Literal-safe value.
 * @returns Single-line text accepted by parseLiteral.
 *
 * @pure true
 * @invariant output never contains line breaks
 * @complexity O(n)
 */
export const formatLiteral = (value: LiteralValue): string => {
  switch (value._tag) {
    case "Str":
      return quoteString(value.value)
    case "Bytes":
      return quoteBytes(value.value)
    case "Int":
      return value.value.toString()
    case "Float":
      return formatFloat(value.value)
    case "Bool":
      return value.value ? "True" : "False"
    case "Null":
      return "None"
    case "Tuple":
      return value.items.length === 1 ? `(${joinItems(value.items)},)` : `(${joinItems(value.items)})`
    case "List":
      return `[${joinItems(value.items)}]`
    case "Set":
      return value.items.length === 0 ? "set()" : `{${joinItems(value.items)}}`
    case "Dict":
      return `{${value.entries.map(([key, entry]) => `${formatLiteral(key)}: ${formatLiteral(entry)}`).join(", ")}}`
  }
}
