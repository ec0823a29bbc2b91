// =============================================================================
// IdGenerator — identifiers minted by the service
// =============================================================================
//
// Two kinds, both random in production:
//   subscriptionId   primary key of a stored subscription
//   requestId        correlation id stamped on every log line of a request
//
// Tests wire a deterministic sequence per kind: subscription-1, request-1, ...
//
import { Context, Effect, Layer, Schema } from "effect"
import { SubscriptionId } from "./SubscriptionRepository.js"

export const RequestId = Schema.String.pipe(Schema.brand("RequestId"))
export type RequestId = typeof RequestId.Type

export interface IdGeneratorService {
  readonly subscriptionId: () => Effect.Effect<SubscriptionId>
  readonly requestId: () => Effect.Effect<RequestId>
}

export class IdGenerator extends Context.Tag("IdGenerator")<
  IdGenerator,
  IdGeneratorService
>() {}

// =============================================================================
// Production: UUID v4
// =============================================================================

const randomUuid = Effect.sync(() => crypto.randomUUID())

export const UuidIdGenerator: IdGeneratorService = {
  subscriptionId: () => Effect.map(randomUuid, SubscriptionId.make),
  requestId: () => Effect.map(randomUuid, RequestId.make)
}

export const UuidIdGeneratorLive = Layer.succeed(IdGenerator, UuidIdGenerator)

// =============================================================================
// Tests: sequential, one counter per kind and per instance
// =============================================================================

const makeSequence = (prefix: string) => {
  let counter = 0
  return Effect.sync(() => `${prefix}-${++counter}`)
}

export const makeTestIdGenerator = (): IdGeneratorService => {
  const subscriptionIds = makeSequence("subscription")
  const requestIds = makeSequence("request")
  return {
    subscriptionId: () => Effect.map(subscriptionIds, SubscriptionId.make),
    requestId: () => Effect.map(requestIds, RequestId.make)
  }
}

// Built per layer construction, so each test app starts from 1
export const TestIdGeneratorLive = Layer.effect(
  IdGenerator,
  Effect.sync(makeTestIdGenerator)
)
