import { Match, ParseResult, Schema } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for the plainconf tool
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ positionals match the command arity
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "get" | "set" | "unset" | "list"

export type ValueType = "str" | "int" | "float" | "bool" | "null" | "bytes" | "literal"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly key: string | undefined
  readonly value: string | undefined
  readonly valueType: ValueType
  readonly maxWidth: number | undefined
  readonly continuationChars: string | undefined
  readonly rewriteOld: boolean
  readonly unsafe: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const usage = [
  "usage: plainconf <command> <file> [args] [flags]",
  "",
  "commands:",
  "  get <file> <key>             print one value",
  "  set <file> <key> <value>     add or replace a value",
  "  unset <file> <key>           remove a key",
  "  list <file>                  print keys in file order",
  "",
  "flags:",
  "  --type <str|int|float|bool|null|bytes|literal>   value type for set (default str)",
  "  --width <n>                  wrap lines longer than n (0 disables)",
  "  --continuation <chars>       candidate continuation markers, in order",
  "  --rewrite-old                keep lines of keys that are no longer present",
  "  --unsafe                     allow opaque serialized values",
  "  --silent                     do not log diagnostics"
].join("\n")

const isFlag = (value: string): boolean => value.startsWith("--")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.when("set", () => Either.right<CliCommand>("set")),
    Match.when("unset", () => Either.right<CliCommand>("unset")),
    Match.when("list", () => Either.right<CliCommand>("list")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const arity = (command: CliCommand): number =>
  Match.value(command).pipe(
    Match.when("get", () => 2),
    Match.when("set", () => 3),
    Match.when("unset", () => 2),
    Match.when("list", () => 1),
    Match.exhaustive
  )

const VALUE_TYPES: ReadonlyArray<ValueType> = ["str", "int", "float", "bool", "null", "bytes", "literal"]

const parseValueType = (value: string): Either.Either<ValueType, CliError> => {
  const found = VALUE_TYPES.find((candidate) => candidate === value)
  return found === undefined
    ? Either.left(cliError(`Invalid --type: ${value} (expected ${VALUE_TYPES.join(", ")})`))
    : Either.right(found)
}

const Width = Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative())

const parseWidth = (value: string): Either.Either<number, CliError> =>
  Schema.decodeUnknownEither(Width)(value).pipe(
    Either.mapLeft((error) =>
      cliError(`Invalid --width: ${value}\n${ParseResult.TreeFormatter.formatErrorSync(error)}`)
    )
  )

interface Options {
  readonly valueType: ValueType
  readonly maxWidth: number | undefined
  readonly continuationChars: string | undefined
  readonly rewriteOld: boolean
  readonly unsafe: boolean
  readonly silent: boolean
}

const defaultOptions: Options = {
  valueType: "str",
  maxWidth: undefined,
  continuationChars: undefined,
  rewriteOld: false,
  unsafe: false,
  silent: false
}

type FlagResult = Either.Either<{ readonly next: Options; readonly consumed: number }, CliError>

type FlagParser = (current: Options, inlineValue: string | undefined, nextValue: string | undefined) => FlagResult

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const switchFlag = (next: Options): FlagResult => Either.right({ next, consumed: 1 })

const valueFlag = <A>(
  flagName: string,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (options: Options, value: A) => Options
): FlagParser =>
(current, inlineValue, nextValue) =>
  readFlagValue(flagName, inlineValue, nextValue).pipe(
    Either.flatMap(decode),
    Either.map((value) => ({ next: update(current, value), consumed: inlineValue === undefined ? 2 : 1 }))
  )

const flagParsers: Record<string, FlagParser> = {
  "rewrite-old": (current) => switchFlag({ ...current, rewriteOld: true }),
  unsafe: (current) => switchFlag({ ...current, unsafe: true }),
  silent: (current) => switchFlag({ ...current, silent: true }),
  type: valueFlag("type", parseValueType, (options, valueType) => ({ ...options, valueType })),
  width: valueFlag("width", parseWidth, (options, maxWidth) => ({ ...options, maxWidth })),
  continuation: valueFlag(
    "continuation",
    (value) =>
      value.length === 0 ? Either.left(cliError("Empty value for --continuation")) : Either.right(value),
    (options, continuationChars) => ({ ...options, continuationChars })
  )
}

const parseFlag = (raw: string, nextValue: string | undefined, current: Options): FlagResult => {
  const [name = "", ...rest] = raw.slice(2).split("=")
  const inlineValue = rest.length === 0 ? undefined : rest.join("=")
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface Split {
  readonly positionals: ReadonlyArray<string>
  readonly options: Options
}

/**
 * Separate flags from positionals; "--" ends flag parsing so keys and values may start with "--".
 */
const splitArgs = (rawArgs: ReadonlyArray<string>): Either.Either<Split, CliError> => {
  const positionals: Array<string> = []
  let options = defaultOptions
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index] ?? ""
    if (current === "--") {
      positionals.push(...rawArgs.slice(index + 1))
      break
    }
    if (!isFlag(current)) {
      positionals.push(current)
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], options)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    options = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right({ positionals, options })
}

const buildArgs = (split: Split): Either.Either<CliArgs, CliError> => {
  const [commandText, ...operands] = split.positionals
  if (commandText === undefined) {
    return Either.left(cliError("Missing command"))
  }
  return Either.flatMap(parseCommand(commandText), (command): Either.Either<CliArgs, CliError> => {
    const expected = arity(command)
    if (operands.length !== expected) {
      return Either.left(cliError(`${command} expects ${expected} argument(s), got ${operands.length}`))
    }
    const [file = "", key, value] = operands
    return Either.right({ command, file, key, value, ...split.options })
  })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant flags may appear anywhere after the program name
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => Either.flatMap(splitArgs(argv.slice(2)), buildArgs)
