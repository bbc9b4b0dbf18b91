import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { ReadOverrides, WriteOverrides } from "../core/config.js"
import { resolveReadOptions, resolveWriteOptions } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { splitLines } from "../core/lines.js"
import { readConfigLines } from "../core/reader.js"
import { renderDiagnostic } from "../core/report.js"
import type { ConfigMap, Diagnostic, ReadResult, StructureEntry, WriteResult } from "../core/types.js"
import { writeConfigLines } from "../core/writer.js"

// CHANGE: read and write configuration files through the platform FileSystem
// WHY: keep IO at the edge while the reader and writer stay pure
// QUOTE(TZ): "the file is readable by its owner only"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,m: write(p, m) ; read(p) = m for encodable m
// PURITY: SHELL
// EFFECT: Effect<ReadResult | WriteResult, AppError, FileSystem>
// INVARIANT: written files end up with mode 0o600 unless chmod fails, which is logged
// COMPLEXITY: O(n)

export const FILE_MODE = 0o600

export const emptyReadResult: ReadResult = { values: new Map(), structure: [], diagnostics: [] }

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const diagnosticAnnotations = (path: string, diagnostic: Diagnostic): Record<string, unknown> => {
  switch (diagnostic.type) {
    case "malformed-line":
      return { file: path, line: diagnostic.line }
    case "decode-failed":
      return { file: path, line: diagnostic.line, key: diagnostic.key }
    case "unsplittable":
      return { file: path, key: diagnostic.key }
  }
}

/**
 * Log diagnostics with file/line/key annotations.
 * Failures to split a long line are errors; the rest are warnings.
 */
export const logDiagnostics = (
  path: string,
  diagnostics: ReadonlyArray<Diagnostic>
): Effect.Effect<void> =>
  Effect.forEach(
    diagnostics,
    (diagnostic) => {
      const log = diagnostic.type === "unsplittable" ? Effect.logError : Effect.logWarning
      return log(renderDiagnostic(diagnostic)).pipe(Effect.annotateLogs(diagnosticAnnotations(path, diagnostic)))
    },
    { discard: true }
  )

/**
 * Read and parse a configuration file.
 *
 * @param path - File path.
 * @param overrides - Read options; unspecified fields use defaults.
 * @returns ReadResult; malformed lines are reported as diagnostics, not failures.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant fails only on IO errors or a truncated continuation
 * @complexity O(n)
 */
export const readConfigFile = (
  path: string,
  overrides: ReadOverrides = {}
): Effect.Effect<ReadResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const result = yield* _(fromEither(readConfigLines(splitLines(contents), resolveReadOptions(overrides))))
    yield* _(logDiagnostics(path, result.diagnostics))
    return result
  })

/**
 * Like readConfigFile, but a missing file reads as empty.
 */
export const readConfigFileOrEmpty = (
  path: string,
  overrides: ReadOverrides = {}
): Effect.Effect<ReadResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return exists ? yield* _(readConfigFile(path, overrides)) : emptyReadResult
  })

const restrictMode = (path: string): Effect.Effect<void, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      pipe(
        fs.chmod(path, FILE_MODE),
        Effect.catchAll((error) =>
          Effect.logError(`cannot set mode ${FILE_MODE.toString(8)}: ${String(error)}`).pipe(
            Effect.annotateLogs({ file: path })
          )
        )
      )
    )
  })

/**
 * Render a mapping against prior structure and write it to disk.
 *
 * @param path - File path; created when missing.
 * @param values - Mapping to store.
 * @param structure - Structure from a previous read, or [] for a fresh file.
 * @param overrides - Write options; unspecified fields use defaults.
 * @returns WriteResult with the lines written.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant nothing is written when a key or value cannot be encoded
 * @complexity O(n)
 */
export const writeConfigFile = (
  path: string,
  values: ConfigMap,
  structure: ReadonlyArray<StructureEntry>,
  overrides: WriteOverrides = {}
): Effect.Effect<WriteResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const result = yield* _(fromEither(writeConfigLines(values, structure, resolveWriteOptions(overrides))))
    yield* _(
      fs.writeFileString(path, result.lines.join(""), { mode: FILE_MODE }).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
    yield* _(restrictMode(path))
    yield* _(logDiagnostics(path, result.diagnostics))
    return result
  })
