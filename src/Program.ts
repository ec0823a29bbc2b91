// =============================================================================
// Program.ts — Main Entry Point
// =============================================================================
//
// The edge of the world: read settings, install the logger once, launch the
// server Layer (see Layers.ts).
//
import { Effect, Layer } from "effect"
import { NodeRuntime } from "@effect/platform-node"

import { EnvConfigProvider, Settings } from "./Configuration.js"
import { makeServerLayer } from "./Layers.js"
import { makeTelemetryLayer } from "./Telemetry.js"

const SERVICE_NAME = "newsletter-subscriptions"

const main = Effect.gen(function* () {
  const settings = yield* Settings
  const TelemetryLive = makeTelemetryLayer(SERVICE_NAME, settings.application.logLevel)

  return yield* Effect.gen(function* () {
    yield* Effect.logInfo(`Starting ${SERVICE_NAME} (${settings.environment})`)
    return yield* Layer.launch(makeServerLayer(settings))
  }).pipe(Effect.provide(TelemetryLive))
}).pipe(Effect.withConfigProvider(EnvConfigProvider))

NodeRuntime.runMain(main)
