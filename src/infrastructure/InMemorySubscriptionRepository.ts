// =============================================================================
// InMemorySubscriptionRepository — Adapter Implementation
// =============================================================================
//
// A Map keyed by email. Mirrors the Postgres table's behavior that matters
// to callers:
//   - fresh id per record (from the IdGenerator it is built with)
//   - subscribedAt read from Effect's Clock (TestClock in tests)
//   - a second save for the same email fails, like the unique constraint
//
// Data is lost when the process ends.
//
import { Clock, Effect, Layer, Option } from "effect"
import { IdGenerator, type IdGeneratorService } from "../IdGenerator.js"
import {
  type Subscription,
  SubscriptionRepository,
  type SubscriptionRepositoryService,
  SubscriptionStorageError
} from "../SubscriptionRepository.js"

export const makeInMemorySubscriptionRepository = (
  idGenerator: IdGeneratorService
): SubscriptionRepositoryService => {
  const rows = new Map<string, Subscription>()

  return {
    save: (subscriber) =>
      Effect.gen(function* () {
        if (rows.has(subscriber.email)) {
          return yield* Effect.fail(
            SubscriptionStorageError(`A subscription for "${subscriber.email}" already exists`)
          )
        }
        const id = yield* idGenerator.subscriptionId()
        const now = yield* Clock.currentTimeMillis
        rows.set(subscriber.email, {
          id,
          email: subscriber.email,
          name: subscriber.name,
          subscribedAt: new Date(now)
        })
        return id
      }),

    findByEmail: (email) => Effect.sync(() => Option.fromNullable(rows.get(email)))
  }
}

// Fresh store per build; takes ids from whatever IdGenerator is wired
export const InMemorySubscriptionRepository = Layer.effect(
  SubscriptionRepository,
  Effect.map(IdGenerator, makeInMemorySubscriptionRepository)
)
