// CHANGE: split file text into physical lines and strip their terminators
// WHY: the reader keeps raw lines byte-exact so comments and blank lines round-trip
// REF: req-lines-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: splitLines(t).join("") = t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every line except possibly the last ends with "\n", "\r\n" or "\r"
// COMPLEXITY: O(n)/O(n)

const LINE = /[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/gu

/**
 * Split text into lines that keep their terminators.
 *
 * @param text - Whole file contents.
 * @returns Lines in order; an empty text yields no lines.
 *
 * @pure true
 * @invariant concatenating the result reproduces the input
 * @complexity O(n)
 */
export const splitLines = (text: string): ReadonlyArray<string> => text.match(LINE) ?? []

export const stripTerminator = (line: string): string => line.replace(/[\r\n]+$/u, "")

export const hasTerminator = (line: string): boolean => line.endsWith("\n") || line.endsWith("\r")

/**
 * Raw lines re-emitted verbatim must not glue onto the line that follows.
 */
export const ensureTerminator = (line: string): string => hasTerminator(line) ? line : `${line}\n`
