#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"

import { usage } from "../core/cli.js"
import { renderAppError } from "../core/report.js"
import { StderrLoggerLive } from "../shell/logger.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult or 1/2 on failure
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: command output goes to stdout, everything else to stderr
// COMPLEXITY: O(1)

const writeStdout = (lines: ReadonlyArray<string>): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(lines.map((line) => `${line}\n`).join(""))
  })

const setExitCode = (code: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = code
  })

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  yield* _(writeStdout(result.output))
  if (result.exitCode !== 0) {
    yield* _(setExitCode(result.exitCode))
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.gen(function*(_) {
      yield* _(Effect.logError(renderAppError(error)))
      if (error._tag === "CliError") {
        yield* _(Effect.sync(() => process.stderr.write(`${usage}\n`)))
        return yield* _(setExitCode(2))
      }
      return yield* _(setExitCode(1))
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, Layer.merge(NodeContext.layer, StderrLoggerLive())))
