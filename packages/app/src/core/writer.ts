import * as Either from "effect/Either"

import { encodeValue } from "./codec.js"
import type { WriteOptions } from "./config.js"
import type { EncodeError, InvalidKeyError } from "./errors.js"
import { invalidKeyError } from "./errors.js"
import { ensureTerminator } from "./lines.js"
import { renderLine } from "./render.js"
import type { ConfigMap, Diagnostic, StructureEntry, WriteResult } from "./types.js"
import type { ConfigValue } from "./value.js"

// CHANGE: merge a mapping against prior structure and render the result
// WHY: updates keep comments, blank lines and key order of the existing file
// QUOTE(TZ): "comments and blank lines must survive a rewrite"
// REF: req-writer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m,s: write(m,s) = Right(w) → read(w.lines).values = m (for encodable m)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every key of the mapping is rendered exactly once; Invalid entries are never emitted
// COMPLEXITY: O(n + s) where n = total payload size and s = |structure|

const KEY_RULES: ReadonlyArray<readonly [(key: string) => boolean, string]> = [
  [(key) => key.length === 0, "key is empty"],
  [(key) => key.includes("="), "key contains \"=\""],
  [(key) => key.includes("/"), "key contains \"/\""],
  [(key) => key.includes("\n") || key.includes("\r"), "key contains a line break"],
  [(key) => key.trim().startsWith("#"), "key would be read back as a comment"]
]

/**
 * Check that a key survives a write/read round trip.
 *
 * @pure true
 * @invariant accepted keys contain neither "=" nor "/"
 * @complexity O(n)
 */
export const validateKey = (key: string): Either.Either<string, InvalidKeyError> => {
  const broken = KEY_RULES.find(([violates]) => violates(key))
  return broken === undefined ? Either.right(key) : Either.left(invalidKeyError(key, broken[1]))
}

const validateKeys = (values: ConfigMap): Either.Either<ConfigMap, InvalidKeyError> => {
  for (const key of values.keys()) {
    const checked = validateKey(key)
    if (Either.isLeft(checked)) {
      return Either.left(checked.left)
    }
  }
  return Either.right(values)
}

const renderEntry = (
  key: string,
  value: ConfigValue,
  options: WriteOptions,
  lines: Array<string>,
  diagnostics: Array<Diagnostic>
): Either.Either<void, EncodeError> =>
  encodeValue(value, options).pipe(
    Either.mapLeft((error) => ({ ...error, key })),
    Either.map((encoded) => {
      const rendered = renderLine(key, encoded.modifier, encoded.payload, options)
      lines.push(...rendered.lines)
      if (rendered.unsplittable) {
        diagnostics.push({ type: "unsplittable", key })
      }
    })
  )

/**
 * Render a mapping, reusing the layout of a previously read file.
 *
 * @param values - Current mapping; iteration order decides where new keys go.
 * @param structure - Entries from a previous read, or [] for a fresh file.
 * @param options - Width, continuation candidates, rewriteOld and safety settings.
 * @returns Lines with terminators plus diagnostics, or the first EncodeError; nothing is rendered on failure.
 *
 * @pure true
 * @invariant comment and blank entries are emitted byte-for-byte
 * @complexity O(n + s)
 */
export const writeConfigLines = (
  values: ConfigMap,
  structure: ReadonlyArray<StructureEntry>,
  options: WriteOptions
): Either.Either<WriteResult, EncodeError> => {
  const checked = validateKeys(values)
  if (Either.isLeft(checked)) {
    return Either.left(checked.left)
  }
  const pending = new Map(values)
  const lines: Array<string> = []
  const diagnostics: Array<Diagnostic> = []

  for (const entry of structure) {
    switch (entry._tag) {
      case "KeyLine": {
        const value = pending.get(entry.key)
        if (value === undefined) {
          if (options.rewriteOld) {
            lines.push(ensureTerminator(entry.raw))
          }
          break
        }
        const rendered = renderEntry(entry.key, value, options, lines, diagnostics)
        if (Either.isLeft(rendered)) {
          return Either.left(rendered.left)
        }
        pending.delete(entry.key)
        break
      }
      case "Verbatim":
        lines.push(ensureTerminator(entry.raw))
        break
      case "Invalid":
        break
    }
  }

  for (const [key, value] of pending) {
    const rendered = renderEntry(key, value, options, lines, diagnostics)
    if (Either.isLeft(rendered)) {
      return Either.left(rendered.left)
    }
  }

  return Either.right({ lines, diagnostics })
}
