import type { DecodeError } from "./errors.js"
import type { ConfigValue } from "./value.js"

// CHANGE: define core domain types for read results, structure entries and diagnostics
// WHY: keep IO-free data structures reusable across the reader, the writer, the CLI and tests
// REF: req-structure-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ ReadResult: keys(r.values) ⊆ { e.key | e ∈ r.structure ∧ e._tag = "KeyLine" }
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: diagnostic.type ∈ {"malformed-line","decode-failed","unsplittable"}
// COMPLEXITY: O(1)/O(1)

/**
 * Round-trip token for one logical line of a file.
 * Produced by the reader and handed back to the writer unchanged.
 */
export type StructureEntry =
  | { readonly _tag: "KeyLine"; readonly key: string; readonly raw: string }
  | { readonly _tag: "Verbatim"; readonly raw: string }
  | { readonly _tag: "Invalid"; readonly raw: string }

export const keyLine = (key: string, raw: string): StructureEntry => ({ _tag: "KeyLine", key, raw })

export const verbatim = (raw: string): StructureEntry => ({ _tag: "Verbatim", raw })

export const invalidLine = (raw: string): StructureEntry => ({ _tag: "Invalid", raw })

export type Diagnostic =
  | { readonly type: "malformed-line"; readonly line: number; readonly text: string; readonly reason: string }
  | {
    readonly type: "decode-failed"
    readonly line: number
    readonly key: string
    readonly error: DecodeError
  }
  | { readonly type: "unsplittable"; readonly key: string }

export type ConfigMap = ReadonlyMap<string, ConfigValue>

export interface ReadResult {
  readonly values: ConfigMap
  readonly structure: ReadonlyArray<StructureEntry>
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

export interface WriteResult {
  readonly lines: ReadonlyArray<string>
  readonly diagnostics: ReadonlyArray<Diagnostic>
}
