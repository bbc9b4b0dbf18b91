import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { WriteOverrides } from "../core/config.js"
import { type AppError, keyNotFound, opaqueEntriesError } from "../core/errors.js"
import { displayValue } from "../core/report.js"
import type { ReadResult } from "../core/types.js"
import { parseValueText } from "../core/value-text.js"
import { readConfigFile, readConfigFileOrEmpty, writeConfigFile } from "../shell/config-file.js"

// CHANGE: orchestrate get/set/unset/list with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) = Right(r) → r.exitCode = 0
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: files are written only by set and by unset of a present key
// INVARIANT: without --unsafe, a file with refused p entries other than the target key is never rewritten
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: ReadonlyArray<string>
  readonly exitCode: number
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const requireOperand = (value: string | undefined): string => value ?? ""

const writeOverrides = (cli: CliArgs): WriteOverrides => ({
  safe: !cli.unsafe,
  rewriteOld: cli.rewriteOld,
  ...(cli.maxWidth === undefined ? {} : { maxWidth: cli.maxWidth }),
  ...(cli.continuationChars === undefined ? {} : { continuationChars: cli.continuationChars })
})

/**
 * Fails when safe mode refused entries that a rewrite would drop.
 *
 * @param target - key the command replaces or removes; its own line may go.
 */
const guardRefusedEntries = (
  cli: CliArgs,
  current: ReadResult,
  target: string
): Effect.Effect<void, AppError> => {
  const keys = current.diagnostics.flatMap((diagnostic) =>
    diagnostic.type === "decode-failed" && diagnostic.error._tag === "UnsafeOperationError" &&
      diagnostic.key !== target
      ? [diagnostic.key]
      : []
  )
  return cli.unsafe || keys.length === 0 ? Effect.void : Effect.fail(opaqueEntriesError(cli.file, keys))
}

const done = (output: ReadonlyArray<string>): ProgramResult => ({ output, exitCode: 0 })

const handleGet = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const key = requireOperand(cli.key)
    const { values } = yield* _(readConfigFile(cli.file, { safe: !cli.unsafe }))
    const value = values.get(key)
    if (value === undefined) {
      return yield* _(Effect.fail(keyNotFound(key, cli.file)))
    }
    return done([displayValue(value)])
  })

const handleSet = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const key = requireOperand(cli.key)
    const value = yield* _(fromEither(parseValueText(cli.valueType, requireOperand(cli.value))))
    const current = yield* _(readConfigFileOrEmpty(cli.file, { safe: !cli.unsafe }))
    yield* _(guardRefusedEntries(cli, current, key))
    const next = new Map(current.values).set(key, value)
    yield* _(writeConfigFile(cli.file, next, current.structure, writeOverrides(cli)))
    return done([])
  })

const handleUnset = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const key = requireOperand(cli.key)
    const current = yield* _(readConfigFile(cli.file, { safe: !cli.unsafe }))
    if (!current.values.has(key)) {
      yield* _(Effect.logWarning(`key ${key} is not set`).pipe(Effect.annotateLogs({ file: cli.file, key })))
      return done([])
    }
    yield* _(guardRefusedEntries(cli, current, key))
    const next = new Map(current.values)
    next.delete(key)
    yield* _(writeConfigFile(cli.file, next, current.structure, { ...writeOverrides(cli), rewriteOld: false }))
    return done([])
  })

const handleList = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const { values } = yield* _(readConfigFile(cli.file, { safe: !cli.unsafe }))
    return done([...values.keys()])
  })

const executeCommand = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("get", () => handleGet(cli)),
    Match.when("set", () => handleSet(cli)),
    Match.when("unset", () => handleUnset(cli)),
    Match.when("list", () => handleList(cli)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with stdout lines and exit code.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant --silent drops diagnostics below error level
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = executeCommand(cli)
    return yield* _(cli.silent ? Logger.withMinimumLogLevel(program, LogLevel.Error) : program)
  })
