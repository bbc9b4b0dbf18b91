// CHANGE: define the closed value model for configuration entries
// WHY: encode dispatch becomes an exhaustive switch over _tag instead of runtime type probing
// QUOTE(TZ): "values are typed: strings, bytes, integers, floats, booleans, None and containers of them"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ ConfigValue: isLiteralSafe(v) → v ∈ LiteralValue
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Opaque never occurs inside a LiteralValue
// COMPLEXITY: O(1)/O(1) per constructor, O(n) for predicates

export type Str = { readonly _tag: "Str"; readonly value: string }
export type Bytes = { readonly _tag: "Bytes"; readonly value: Uint8Array }
export type Int = { readonly _tag: "Int"; readonly value: bigint }
export type Float = { readonly _tag: "Float"; readonly value: number }
export type Bool = { readonly _tag: "Bool"; readonly value: boolean }
export type Null = { readonly _tag: "Null" }

export type Scalar = Str | Bytes | Int | Float | Bool | Null

export interface Tuple<V> { readonly _tag: "Tuple"; readonly items: ReadonlyArray<V> }
export interface List<V> { readonly _tag: "List"; readonly items: ReadonlyArray<V> }
export interface SetOf<V> { readonly _tag: "Set"; readonly items: ReadonlyArray<V> }
export interface Dict<V> { readonly _tag: "Dict"; readonly entries: ReadonlyArray<readonly [V, V]> }

export type Container<V> = Tuple<V> | List<V> | SetOf<V> | Dict<V>

export type Opaque = { readonly _tag: "Opaque"; readonly value: unknown }

export type LiteralValue = Scalar | Tuple<LiteralValue> | List<LiteralValue> | SetOf<LiteralValue> | Dict<LiteralValue>

export type ConfigValue = Scalar | Tuple<ConfigValue> | List<ConfigValue> | SetOf<ConfigValue> | Dict<ConfigValue> | Opaque

export const str = (value: string): Str => ({ _tag: "Str", value })

export const bytes = (value: Uint8Array): Bytes => ({ _tag: "Bytes", value })

export const int = (value: number | bigint): Int => ({ _tag: "Int", value: BigInt(value) })

export const float = (value: number): Float => ({ _tag: "Float", value })

export const bool = (value: boolean): Bool => ({ _tag: "Bool", value })

export const nullValue: Null = { _tag: "Null" }

export const tuple = <V extends ConfigValue>(items: ReadonlyArray<V>): Tuple<V> => ({ _tag: "Tuple", items })

export const list = <V extends ConfigValue>(items: ReadonlyArray<V>): List<V> => ({ _tag: "List", items })

export const set = <V extends ConfigValue>(items: ReadonlyArray<V>): SetOf<V> => ({ _tag: "Set", items })

export const dict = <V extends ConfigValue>(entries: ReadonlyArray<readonly [V, V]>): Dict<V> => ({
  _tag: "Dict",
  entries
})

export const opaque = (value: unknown): Opaque => ({ _tag: "Opaque", value })

const isScalar = (value: ConfigValue): value is Scalar =>
  value._tag === "Str" ||
  value._tag === "Bytes" ||
  value._tag === "Int" ||
  value._tag === "Float" ||
  value._tag === "Bool" ||
  value._tag === "Null"

/**
 * Check whether a value can serve as a set item or dict key.
 *
 * @param value - Candidate value.
 * @returns true for scalars and for tuples whose items are hashable.
 *
 * @pure true
 * @invariant lists, sets, dicts and opaque values are never hashable
 * @complexity O(n)
 */
export const isHashable = (value: ConfigValue): boolean => {
  if (isScalar(value)) {
    return true
  }
  if (value._tag === "Tuple") {
    return value.items.every(isHashable)
  }
  return false
}

/**
 * Recursive literal-safety predicate.
 *
 * @param value - Any configuration value.
 * @returns true when the value is representable in the restricted literal syntax.
 *
 * @pure true
 * @invariant set items and dict keys of a safe value are hashable
 * @complexity O(n) where n = number of nested values
 */
export const isLiteralSafe = (value: ConfigValue): value is LiteralValue => {
  switch (value._tag) {
    case "Str":
    case "Bytes":
    case "Int":
    case "Float":
    case "Bool":
    case "Null":
      return true
    case "Tuple":
    case "List":
      return value.items.every(isLiteralSafe)
    case "Set":
      return value.items.every((item) => isHashable(item) && isLiteralSafe(item))
    case "Dict":
      return value.entries.every(([key, entry]) => isHashable(key) && isLiteralSafe(key) && isLiteralSafe(entry))
    case "Opaque":
      return false
  }
}

const describeOpaque = (value: unknown): string => {
  if (value === null) {
    return "null"
  }
  if (typeof value === "object") {
    const prototype: unknown = Object.getPrototypeOf(value)
    const ctor: unknown = typeof prototype === "object" && prototype !== null
      ? Reflect.get(prototype, "constructor")
      : undefined
    return typeof ctor === "function" && ctor.name.length > 0 ? ctor.name : "object"
  }
  return typeof value
}

/**
 * Human-readable type name used in error messages.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeValue = (value: ConfigValue): string =>
  value._tag === "Opaque" ? `Opaque(${describeOpaque(value.value)})` : value._tag
