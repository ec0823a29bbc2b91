// =============================================================================
// LogCapture — records log lines for assertions
// =============================================================================
//
// USAGE:
//   const capture = makeLogCapture()
//   yield* program.pipe(Effect.provide(capture.layer))
//   expect(capture.logs()).toContainEqual(...)
//
import { HashMap, Logger } from "effect"

export interface CapturedLog {
  readonly level: string
  readonly message: string
  readonly annotations: Readonly<Record<string, unknown>>
}

export const makeLogCapture = () => {
  const captured: CapturedLog[] = []

  const logger = Logger.make(({ logLevel, message, annotations }) => {
    const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message]
    captured.push({
      level: logLevel.label,
      message: parts.map(String).join(" "),
      annotations: Object.fromEntries(HashMap.toEntries(annotations))
    })
  })

  return {
    layer: Logger.add(logger),
    logs: (): ReadonlyArray<CapturedLog> => [...captured]
  }
}
