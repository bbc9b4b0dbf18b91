import type { CodecOptions } from "./codec.js"
import { DEFAULT_MAX_LITERAL_DEPTH } from "./literal.js"
import type { OpaqueSerializer } from "./opaque.js"
import { v8Serializer } from "./opaque.js"

// CHANGE: define read/write option merging rules and defaults
// WHY: callers override a subset of options and the rest fall back deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(overrides).k = overrides.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: continuation candidates never contain "=", CR or LF
// COMPLEXITY: O(n)/O(n)

export const DEFAULT_MAX_WIDTH = 72

export const DEFAULT_CONTINUATION_CHARS = "\\|⤸;↓↘→⟶⇒⇨⇩▼▽◢◣⤵║│┃┆┇┊┋∣⎟⎢⎥"

export type ReadOptions = CodecOptions

export interface WriteOptions extends CodecOptions {
  readonly maxWidth: number
  readonly continuationChars: ReadonlyArray<string>
  readonly rewriteOld: boolean
}

export interface ReadOverrides {
  readonly safe?: boolean
  readonly serializer?: OpaqueSerializer
  readonly maxLiteralDepth?: number
}

export interface WriteOverrides extends ReadOverrides {
  readonly maxWidth?: number
  readonly continuationChars?: string
  readonly rewriteOld?: boolean
}

const FORBIDDEN_CONTINUATION: ReadonlySet<string> = new Set(["=", "\r", "\n"])

/**
 * Turn a candidate string into ordered, distinct code points usable as markers.
 *
 * @pure true
 * @invariant result never contains "=", CR or LF
 * @complexity O(n)
 */
export const continuationCandidates = (chars: string): ReadonlyArray<string> => [
  ...new Set([...chars].filter((char) => !FORBIDDEN_CONTINUATION.has(char)))
]

export const resolveReadOptions = (overrides: ReadOverrides = {}): ReadOptions => ({
  safe: overrides.safe ?? true,
  serializer: overrides.serializer ?? v8Serializer,
  maxLiteralDepth: overrides.maxLiteralDepth ?? DEFAULT_MAX_LITERAL_DEPTH
})

export const resolveWriteOptions = (overrides: WriteOverrides = {}): WriteOptions => ({
  ...resolveReadOptions(overrides),
  maxWidth: Math.max(0, Math.trunc(overrides.maxWidth ?? DEFAULT_MAX_WIDTH)),
  continuationChars: continuationCandidates(overrides.continuationChars ?? DEFAULT_CONTINUATION_CHARS),
  rewriteOld: overrides.rewriteOld ?? false
})
