import { Cause, HashMap, Layer, Logger, LogLevel, Option, pipe } from "effect"

// CHANGE: route Effect logs to stderr as single plain-text lines
// WHY: stdout carries command output only, so diagnostics must not mix with it
// REF: req-logger-1
// SOURCE: n/a
// FORMAT THEOREM: ∀entry: format(entry) = LEVEL + " " + [file:line key] + message
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: every log entry becomes exactly one stderr write
// COMPLEXITY: O(n) in the message length

const annotationText = (annotations: HashMap.HashMap<string, unknown>, key: string): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((value) => typeof value === "string" || typeof value === "number"),
    Option.map(String)
  )

const formatContext = (annotations: HashMap.HashMap<string, unknown>): string => {
  const file = annotationText(annotations, "file")
  const line = annotationText(annotations, "line")
  const key = annotationText(annotations, "key")
  const location = pipe(
    file,
    Option.map((name) => pipe(line, Option.match({ onNone: () => name, onSome: (row) => `${name}:${row}` })))
  )
  const parts = [location, pipe(key, Option.map((name) => `key=${name}`))].flatMap((part) =>
    Option.isSome(part) ? [part.value] : []
  )
  return parts.length === 0 ? "" : `[${parts.join(" ")}] `
}

const formatMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message)

/**
 * Render one log entry.
 *
 * @param level - Effect log level label, e.g. "WARN".
 * @param message - Logged message (a single value or the argument array).
 * @param annotations - Log annotations; "file", "line" and "key" are shown as context.
 * @returns Single line without terminator (multi-line only when a cause is attached).
 *
 * @pure true
 * @invariant annotations other than file, line and key are ignored
 * @complexity O(n)
 */
export const formatLogLine = (
  level: string,
  message: unknown,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown> = Cause.empty
): string => {
  const text = `${level.padEnd(5)} ${formatContext(annotations)}${formatMessage(message)}`
  return Cause.isEmpty(cause) ? text : `${text}\n${Cause.pretty(cause)}`
}

export const stderrLogger: Logger.Logger<unknown, void> = Logger.make(({ annotations, cause, logLevel, message }) => {
  process.stderr.write(`${formatLogLine(logLevel.label, message, annotations, cause)}\n`)
})

/**
 * Replace the default logger with the stderr logger.
 *
 * @param level - Minimum level to print.
 */
export const StderrLoggerLive = (level: LogLevel.LogLevel = LogLevel.Info): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, stderrLogger),
    Logger.minimumLogLevel(level)
  )
