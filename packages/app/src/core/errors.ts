import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for codec, reader, writer and CLI
// WHY: per-line decode failures stay local while encode and structural failures escalate
// QUOTE(TZ): "a bad line must not stop the rest of the file from loading"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type UnsafeValueError = {
  readonly _tag: "UnsafeValueError"
  readonly key: string | undefined
  readonly valueType: string
  readonly reason: string
}
export type InvalidKeyError = { readonly _tag: "InvalidKeyError"; readonly key: string; readonly reason: string }
export type UnsafeOperationError = { readonly _tag: "UnsafeOperationError"; readonly operation: string }
export type FormatError = { readonly _tag: "FormatError"; readonly operation: string; readonly message: string }
export type EncodingError = { readonly _tag: "EncodingError"; readonly operation: string; readonly message: string }
export type TypeMismatchError = {
  readonly _tag: "TypeMismatchError"
  readonly operation: string
  readonly actual: string
}
export type UnknownModifierError = { readonly _tag: "UnknownModifierError"; readonly modifier: string }
export type UnexpectedEndOfInput = {
  readonly _tag: "UnexpectedEndOfInput"
  readonly line: number
  readonly key: string
  readonly marker: string
}
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type KeyNotFound = { readonly _tag: "KeyNotFound"; readonly key: string; readonly file: string }
export type OpaqueEntriesError = {
  readonly _tag: "OpaqueEntriesError"
  readonly file: string
  readonly keys: ReadonlyArray<string>
}

export type DecodeError =
  | UnsafeOperationError
  | FormatError
  | EncodingError
  | TypeMismatchError
  | UnknownModifierError

export type EncodeError = UnsafeValueError | InvalidKeyError

export type AppError =
  | CliError
  | EncodeError
  | UnexpectedEndOfInput
  | FileError
  | KeyNotFound
  | OpaqueEntriesError

export const unsafeValueError = (valueType: string, reason: string, key?: string): UnsafeValueError => ({
  _tag: "UnsafeValueError",
  key,
  valueType,
  reason
})

export const invalidKeyError = (key: string, reason: string): InvalidKeyError => ({
  _tag: "InvalidKeyError",
  key,
  reason
})

export const unsafeOperationError = (operation: string): UnsafeOperationError => ({
  _tag: "UnsafeOperationError",
  operation
})

export const formatError = (operation: string, message: string): FormatError => ({
  _tag: "FormatError",
  operation,
  message
})

export const encodingError = (operation: string, message: string): EncodingError => ({
  _tag: "EncodingError",
  operation,
  message
})

export const typeMismatchError = (operation: string, actual: string): TypeMismatchError => ({
  _tag: "TypeMismatchError",
  operation,
  actual
})

export const unknownModifierError = (modifier: string): UnknownModifierError => ({
  _tag: "UnknownModifierError",
  modifier
})

export const unexpectedEndOfInput = (line: number, key: string, marker: string): UnexpectedEndOfInput => ({
  _tag: "UnexpectedEndOfInput",
  line,
  key,
  marker
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const keyNotFound = (key: string, file: string): KeyNotFound => ({
  _tag: "KeyNotFound",
  key,
  file
})

export const opaqueEntriesError = (file: string, keys: ReadonlyArray<string>): OpaqueEntriesError => ({
  _tag: "OpaqueEntriesError",
  file,
  keys
})
