import { deserialize, serialize } from "node:v8"

import { ParseResult, Schema } from "effect"
import * as Either from "effect/Either"

import type { ConfigValue } from "./value.js"

// CHANGE: model opaque object serialization as a pluggable capability
// WHY: values outside the literal closure need a binary form, which must stay behind the safety flag
// QUOTE(TZ): "other objects may be stored only when safe mode is off"
// REF: req-opaque-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: deserialize(serialize(v)) = Right(v') where v' ≅ v under structured clone
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: deserialized payloads are validated as ConfigValue before use
// COMPLEXITY: O(n)/O(n)

/**
 * Serialization scheme for values that cannot be written as literals.
 * Deserializing untrusted input is unsafe; callers gate it behind `safe: false`.
 */
export interface OpaqueSerializer {
  readonly name: string
  readonly serialize: (value: ConfigValue) => Either.Either<Uint8Array, string>
  readonly deserialize: (payload: Uint8Array) => Either.Either<ConfigValue, string>
}

const ConfigValueSchema: Schema.Schema<ConfigValue> = Schema.suspend(() =>
  Schema.Union(
    Schema.TaggedStruct("Str", { value: Schema.String }),
    Schema.TaggedStruct("Bytes", { value: Schema.Uint8ArrayFromSelf }),
    Schema.TaggedStruct("Int", { value: Schema.BigIntFromSelf }),
    Schema.TaggedStruct("Float", { value: Schema.Number }),
    Schema.TaggedStruct("Bool", { value: Schema.Boolean }),
    Schema.TaggedStruct("Null", {}),
    Schema.TaggedStruct("Tuple", { items: Schema.Array(ConfigValueSchema) }),
    Schema.TaggedStruct("List", { items: Schema.Array(ConfigValueSchema) }),
    Schema.TaggedStruct("Set", { items: Schema.Array(ConfigValueSchema) }),
    Schema.TaggedStruct("Dict", { entries: Schema.Array(Schema.Tuple(ConfigValueSchema, ConfigValueSchema)) }),
    Schema.TaggedStruct("Opaque", { value: Schema.Unknown })
  )
)

const decodeConfigValue = Schema.decodeUnknownEither(ConfigValueSchema)

const describeError = (error: unknown): string => error instanceof Error ? error.message : String(error)

/**
 * Default serializer backed by the V8 structured-serialization format.
 * Dates, Maps, Sets, typed arrays and plain objects survive; functions and
 * class prototypes do not.
 */
export const v8Serializer: OpaqueSerializer = {
  name: "v8",
  serialize: (value) =>
    Either.try({
      try: () => Uint8Array.from(serialize(value)),
      catch: describeError
    }),
  deserialize: (payload) =>
    Either.try({
      try: (): unknown => deserialize(payload),
      catch: describeError
    }).pipe(
      Either.flatMap((raw) =>
        decodeConfigValue(raw).pipe(
          Either.mapLeft((error) => ParseResult.TreeFormatter.formatErrorSync(error))
        )
      )
    )
}
