// CHANGE: render (key, modifier, payload) triples as physical lines with continuation wrapping
// WHY: long payloads stay diff-friendly when split at a marker that cannot occur in the payload
// QUOTE(TZ): "long values are split over several lines with a continuation character"
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k,m,p: join(render(k,m,p)) decodes back to p under the C<marker> rule
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every rendered line ends with "\n"; the marker never occurs in the payload
// COMPLEXITY: O(n) where n = payload length in code points

export interface RenderOptions {
  readonly maxWidth: number
  readonly continuationChars: ReadonlyArray<string>
}

export interface Rendered {
  readonly lines: ReadonlyArray<string>
  readonly unsplittable: boolean
}

const NICE_BREAKS: ReadonlySet<string> = new Set([" ", "]", ")", "}", ",", ";", "-", "+", "\n", "\t"])

const codePointLength = (text: string): number => [...text].length

const singleLine = (key: string, modifier: string, payload: string): string =>
  modifier.length > 0 ? `${key}/${modifier}=${payload}\n` : `${key}=${payload}\n`

/**
 * Pick the first candidate that does not occur in the payload.
 *
 * @pure true
 * @complexity O(c·n)
 */
export const chooseContinuation = (
  payload: string,
  candidates: ReadonlyArray<string>
): string | undefined => candidates.find((candidate) => !payload.includes(candidate))

/**
 * Prefer cutting just before a separator found between 3/4 of the budget and the budget.
 */
const findCut = (rest: ReadonlyArray<string>, budget: number): number => {
  const lower = Math.floor((budget * 3) / 4)
  if (budget <= lower || lower <= 2) {
    return budget
  }
  for (let index = budget; index > lower; index--) {
    if (NICE_BREAKS.has(rest[index] ?? "")) {
      return index
    }
  }
  return budget
}

/**
 * Render one entry as one or more physical lines.
 *
 * @param key - Validated key.
 * @param modifier - Modifier chosen by the codec, without the leading "/".
 * @param payload - Encoded payload.
 * @param options - Maximum width (0 disables wrapping) and ordered continuation candidates.
 * @returns Lines with terminators, and whether wrapping was needed but impossible.
 *
 * @pure true
 * @invariant a wrapped entry carries the modifier "C<marker>" + modifier
 * @complexity O(n)
 */
export const renderLine = (
  key: string,
  modifier: string,
  payload: string,
  options: RenderOptions
): Rendered => {
  const width = options.maxWidth
  const keyLength = codePointLength(key)
  let rest: ReadonlyArray<string> = [...payload]
  if (width <= 0 || keyLength + codePointLength(modifier) + rest.length + 2 < width) {
    return { lines: [singleLine(key, modifier, payload)], unsplittable: false }
  }
  const marker = chooseContinuation(payload, options.continuationChars)
  if (marker === undefined) {
    return { lines: [singleLine(key, modifier, payload)], unsplittable: true }
  }
  const fullModifier = `/C${marker}${modifier}`
  const lines: Array<string> = []
  let prefix = `${key}${fullModifier}=`
  let used = keyLength + codePointLength(fullModifier) + 2
  while (used + rest.length > width) {
    const cut = findCut(rest, Math.max(width - used, 2))
    lines.push(`${prefix}${rest.slice(0, cut).join("")}${marker}\n`)
    rest = rest.slice(cut)
    prefix = ""
    used = 0
  }
  lines.push(`${prefix}${rest.join("")}\n`)
  return { lines, unsplittable: false }
}
