// =============================================================================
// HTTP API Definition
// =============================================================================
//
// EFFECT PLATFORM PATTERN:
// 1. Define the API schema (HttpApi + HttpApiGroup + HttpApiEndpoint)
// 2. Implement handlers (HttpApiBuilder.group)
// 3. Serve (HttpApiBuilder.serve, see Program.ts)
//
// ENDPOINTS:
//   GET  /health_check   → 200, empty body
//   POST /subscriptions  → 200 | 400 | 500, always an empty body
//
// The subscription payload is URL-form-encoded. Both fields are declared
// optional on the wire: a missing field is a rejected subscription (400,
// empty body) decided by the handler, not a schema decode error.
// Any body that does not decode as that form is rejected the same way.
//
import {
  HttpApi,
  HttpApiBuilder,
  HttpApiEndpoint,
  HttpApiGroup,
  HttpApiSchema,
  HttpServerRequest,
  HttpServerResponse
} from "@effect/platform"
import { Effect, Layer, Schema } from "effect"

import { subscribe } from "../usecases/Subscribe.js"

// =============================================================================
// Request Schemas
// =============================================================================

const SubscriptionForm = Schema.Struct({
  name: Schema.optional(Schema.String),
  email: Schema.optional(Schema.String)
}).pipe(HttpApiSchema.withEncoding({ kind: "UrlParams" }))

// =============================================================================
// Error Schemas
// =============================================================================
//
// Empty-bodied errors: nothing about the failure is sent to the client.
//

export class SubscriptionRejected extends HttpApiSchema.EmptyError<SubscriptionRejected>()({
  tag: "SubscriptionRejected",
  status: 400
}) {}

export class SubscriptionFailed extends HttpApiSchema.EmptyError<SubscriptionFailed>()({
  tag: "SubscriptionFailed",
  status: 500
}) {}

// =============================================================================
// API Definition
// =============================================================================

const HealthGroup = HttpApiGroup.make("health")
  .add(
    HttpApiEndpoint.get("healthCheck", "/health_check")
      .addSuccess(Schema.Void, { status: 200 })
  )

const SubscriptionsGroup = HttpApiGroup.make("subscriptions")
  .add(
    HttpApiEndpoint.post("subscribe", "/subscriptions")
      .setPayload(SubscriptionForm)
      .addSuccess(Schema.Void, { status: 200 })
      .addError(SubscriptionRejected)
      .addError(SubscriptionFailed)
  )

export const Api = HttpApi.make("NewsletterApi")
  .add(HealthGroup)
  .add(SubscriptionsGroup)

export type Api = typeof Api

// =============================================================================
// API Implementation (Handlers)
// =============================================================================

const HealthHandlers = HttpApiBuilder.group(Api, "health", (handlers) =>
  handlers.handle("healthCheck", () => Effect.logDebug("Health check is working!"))
)

// The form is read in the handler (handleRaw) rather than by the endpoint's
// payload decoder, so an unreadable body (wrong content type, repeated
// field) is a bare 400 like any other rejection.
const readSubscriptionForm = HttpServerRequest.schemaBodyUrlParams(SubscriptionForm).pipe(
  Effect.tapError((error) =>
    Effect.logInfo("Subscription rejected: unreadable form").pipe(
      Effect.annotateLogs("reason", error._tag)
    )
  ),
  Effect.mapError(() => new SubscriptionRejected())
)

const SubscriptionsHandlers = HttpApiBuilder.group(Api, "subscriptions", (handlers) =>
  handlers.handleRaw("subscribe", () =>
    Effect.gen(function* () {
      const { email, name } = yield* readSubscriptionForm
      if (email === undefined || name === undefined) {
        yield* Effect.logInfo("Subscription rejected: missing form field").pipe(
          Effect.annotateLogs({
            email_present: email !== undefined,
            name_present: name !== undefined
          })
        )
        return yield* Effect.fail(new SubscriptionRejected())
      }

      yield* subscribe({ email, name })
      return HttpServerResponse.empty({ status: 200 })
    }).pipe(
      Effect.catchTag("SubscriberValidationError", () =>
        Effect.fail(new SubscriptionRejected())
      ),
      // Details were logged by the use case; the client gets a bare 500
      Effect.catchTag("SubscriptionStorageError", () =>
        Effect.fail(new SubscriptionFailed())
      )
    )
  )
)

// =============================================================================
// API Layer (combines all handlers)
// =============================================================================

export const ApiLive = HttpApiBuilder.api(Api).pipe(
  Layer.provide(HealthHandlers),
  Layer.provide(SubscriptionsHandlers)
)
