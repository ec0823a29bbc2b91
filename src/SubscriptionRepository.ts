// =============================================================================
// SubscriptionRepository — The Port (Interface)
// =============================================================================
//
// HEXAGONAL ARCHITECTURE:
// The use case depends on this port. Adapters (Postgres, InMemory) live in
// infrastructure/ and are wired with Layers at the edge of the world.
//
// The repository stores; it does not decide. Everything it receives is a
// NewSubscriber, so it never sees unvalidated data.
//
// RECORD:
//   id:           fresh random identifier, generated on save
//   email, name:  the validated strings, stored as given
//   subscribedAt: UTC instant captured when the record is accepted
//
import type { Effect, Option } from "effect"
import { Context, Schema } from "effect"
import type { NewSubscriber } from "./domain/subscriber/NewSubscriber.js"

// =============================================================================
// Persisted Record
// =============================================================================

export const SubscriptionId = Schema.String.pipe(Schema.brand("SubscriptionId"))
export type SubscriptionId = typeof SubscriptionId.Type

export const Subscription = Schema.Struct({
  id: SubscriptionId,
  email: Schema.String,
  name: Schema.String,
  subscribedAt: Schema.DateFromSelf
})

export type Subscription = typeof Subscription.Type

// =============================================================================
// Errors
// =============================================================================
//
// Infrastructure-caused: connection, constraint or query failure.
// `cause` is for server-side logs only; it never reaches an HTTP response.
//

export type SubscriptionStorageError = {
  readonly _tag: "SubscriptionStorageError"
  readonly message: string
  readonly cause?: unknown
}

export const SubscriptionStorageError = (
  message: string,
  cause?: unknown
): SubscriptionStorageError => ({
  _tag: "SubscriptionStorageError",
  message,
  cause
})

// =============================================================================
// Service Interface + Tag
// =============================================================================

export interface SubscriptionRepositoryService {
  /**
   * Persist a new subscriber.
   *
   * Returns: the generated identifier of the stored record
   */
  readonly save: (
    subscriber: NewSubscriber
  ) => Effect.Effect<SubscriptionId, SubscriptionStorageError>

  /**
   * Read back a stored record by its email string.
   */
  readonly findByEmail: (
    email: string
  ) => Effect.Effect<Option.Option<Subscription>, SubscriptionStorageError>
}

export class SubscriptionRepository extends Context.Tag("SubscriptionRepository")<
  SubscriptionRepository,
  SubscriptionRepositoryService
>() {}
