// =============================================================================
// Telemetry — process-wide logger
// =============================================================================
//
// Installed once, at the edge of the world (Program.ts), and inherited by
// every fiber the server forks. Nothing else touches logger setup.
//
// Output: one JSON object per line (Logger.jsonLogger), with the service
// name added to every record's annotations. Request-scoped annotations
// (request_id, subscriber_email, ...) are added by the use cases.
//
import type { LogLevel } from "effect"
import { HashMap, Layer, Logger } from "effect"

export const makeServiceLogger = (serviceName: string): Logger.Logger<unknown, void> =>
  Logger.jsonLogger.pipe(
    Logger.mapInputOptions((options: Logger.Logger.Options<unknown>) => ({
      ...options,
      annotations: HashMap.set(options.annotations, "name", serviceName)
    })),
    Logger.withConsoleLog
  )

export const makeTelemetryLayer = (
  serviceName: string,
  level: LogLevel.LogLevel
): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, makeServiceLogger(serviceName)),
    Logger.minimumLogLevel(level)
  )
