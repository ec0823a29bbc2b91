// =============================================================================
// Subscribe Use Case
// =============================================================================
//
// ORCHESTRATION (one request):
//
//   Received ──validate──► Validated ──save──► Persisted ──send──► Completed
//      │                      │
//      └─► Rejected (400)     └─► StorageFailed (500)
//
//   1. Tag the request with a fresh correlation id
//   2. Parse raw strings into a NewSubscriber (no I/O on failure)
//   3. Persist through SubscriptionRepository
//   4. If an EmailService is wired, send one confirmation email.
//      A failed send is logged and swallowed: the record is already stored
//      and the response stays a success.
//   5. Return the new record's id
//
// DEPENDENCIES (in Effect's R parameter):
//   - IdGenerator: correlation id
//   - SubscriptionRepository: persistence
// EmailService is looked up with Effect.serviceOption, so it is optional.
//
import { Effect, Either, Option } from "effect"
import { NewSubscriber } from "../domain/subscriber/NewSubscriber.js"
import type { SubscriberValidationError } from "../domain/subscriber/Errors.js"
import { EmailService } from "../EmailService.js"
import { IdGenerator } from "../IdGenerator.js"
import { reactToNewSubscriber } from "../reactions/SubscriberReactions.js"
import {
  SubscriptionRepository,
  type SubscriptionId,
  type SubscriptionStorageError
} from "../SubscriptionRepository.js"

// =============================================================================
// Types
// =============================================================================

// Raw form fields, already URL-decoded by the transport
export interface SubscribeInput {
  readonly email: string
  readonly name: string
}

export interface SubscribeOutput {
  readonly id: SubscriptionId
}

export type SubscribeError = SubscriberValidationError | SubscriptionStorageError

// =============================================================================
// Steps
// =============================================================================

// "SqlError: Failed to execute statement <- error: duplicate key value ..."
const describeCause = (cause: unknown): string => {
  const chain: string[] = []
  let current: unknown = cause
  while (current !== undefined && chain.length < 8) {
    chain.push(String(current))
    current = current instanceof Error ? current.cause : undefined
  }
  return chain.join(" <- ")
}

const sendConfirmation = (subscriber: NewSubscriber) =>
  Effect.gen(function* () {
    const maybeEmailService = yield* Effect.serviceOption(EmailService)
    if (Option.isNone(maybeEmailService)) {
      return
    }

    yield* reactToNewSubscriber(subscriber).pipe(
      Effect.provideService(EmailService, maybeEmailService.value),
      Effect.zipRight(Effect.logInfo("Confirmation email sent")),
      Effect.catchTag("EmailSendError", (error) =>
        Effect.logError("Failed to send a confirmation email").pipe(
          Effect.annotateLogs("error", error.message)
        )
      )
    )
  })

const processSubscription = (
  input: SubscribeInput
): Effect.Effect<SubscribeOutput, SubscribeError, SubscriptionRepository> =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Adding a new subscriber")

    // 1. Validate: email first, then name
    const parsed = NewSubscriber.fromForm(input.email, input.name)
    if (Either.isLeft(parsed)) {
      yield* Effect.logInfo("Subscription rejected").pipe(
        Effect.annotateLogs("reason", parsed.left.message)
      )
      return yield* Effect.fail(parsed.left)
    }
    const newSubscriber = parsed.right

    // 2. Persist
    const repository = yield* SubscriptionRepository
    const id = yield* repository.save(newSubscriber).pipe(
      Effect.tapError((error) =>
        Effect.logError("Failed to save new subscriber details").pipe(
          Effect.annotateLogs({ error: error.message, cause: describeCause(error.cause) })
        )
      )
    )
    yield* Effect.logInfo("New subscriber details have been saved").pipe(
      Effect.annotateLogs("subscription_id", id)
    )

    // 3. Notify (best-effort)
    yield* sendConfirmation(newSubscriber)

    return { id }
  })

// =============================================================================
// Use Case Implementation
// =============================================================================

export const subscribe = (
  input: SubscribeInput
): Effect.Effect<SubscribeOutput, SubscribeError, IdGenerator | SubscriptionRepository> =>
  Effect.gen(function* () {
    const idGenerator = yield* IdGenerator
    const requestId = yield* idGenerator.requestId()

    return yield* processSubscription(input).pipe(
      Effect.annotateLogs({
        request_id: requestId,
        subscriber_email: input.email,
        subscriber_name: input.name
      }),
      Effect.withSpan("Adding a new subscriber", {
        attributes: { request_id: requestId }
      })
    )
  })
