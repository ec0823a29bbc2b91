// =============================================================================
// PostgresSubscriptionRepository — Adapter Implementation
// =============================================================================
//
// TABLE (see Migrations.ts):
//   subscriptions(id uuid PK, email text UNIQUE, name text, subscribed_at timestamptz)
//
// The id comes from the IdGenerator (random UUID in production), the
// timestamp from Effect's Clock at the moment of the call. Every SQL error
// becomes a SubscriptionStorageError carrying the original as `cause`.
//
import { Clock, Effect, Layer, Option, Schema } from "effect"
import { PgClient } from "@effect/sql-pg"

import { IdGenerator } from "../IdGenerator.js"
import {
  Subscription,
  SubscriptionRepository,
  type SubscriptionRepositoryService,
  SubscriptionStorageError
} from "../SubscriptionRepository.js"

interface SubscriptionRow {
  readonly id: string
  readonly email: string
  readonly name: string
  readonly subscribed_at: Date
}

const decodeSubscription = Schema.decodeUnknown(Subscription)

const makePostgresSubscriptionRepository = Effect.gen(function* () {
  const sql = yield* PgClient.PgClient
  const idGenerator = yield* IdGenerator

  const service: SubscriptionRepositoryService = {
    save: (subscriber) =>
      Effect.gen(function* () {
        const id = yield* idGenerator.subscriptionId()
        const subscribedAt = new Date(yield* Clock.currentTimeMillis)

        yield* sql`
          INSERT INTO subscriptions (id, email, name, subscribed_at)
          VALUES (${id}, ${subscriber.email}, ${subscriber.name}, ${subscribedAt})
        `
        return id
      }).pipe(
        Effect.mapError((cause) =>
          SubscriptionStorageError("Failed to save new subscriber details", cause)
        ),
        Effect.withSpan("Saving new subscriber details in the database")
      ),

    findByEmail: (email) =>
      Effect.gen(function* () {
        const rows = yield* sql<SubscriptionRow>`
          SELECT id, email, name, subscribed_at
          FROM subscriptions
          WHERE email = ${email}
        `
        if (rows.length === 0) {
          return Option.none()
        }
        const row = rows[0]
        const subscription = yield* decodeSubscription({
          id: row.id,
          email: row.email,
          name: row.name,
          subscribedAt: row.subscribed_at
        })
        return Option.some(subscription)
      }).pipe(
        Effect.mapError((cause) =>
          SubscriptionStorageError("Failed to read subscription", cause)
        )
      )
  }

  return service
})

export const PostgresSubscriptionRepository = Layer.effect(
  SubscriptionRepository,
  makePostgresSubscriptionRepository
)
