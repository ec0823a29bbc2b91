// =============================================================================
// NewSubscriber — Aggregate
// =============================================================================
//
// The only shape in which "a subscriber" exists past the HTTP boundary.
// Both fields are branded, so a NewSubscriber cannot be assembled from
// unvalidated strings.
//
// ORDERING CONTRACT:
// `fromForm` parses the email first. When both fields are invalid, the
// email error is the one returned.
//
import { Either, Schema } from "effect"
import type { SubscriberValidationError } from "./Errors.js"
import { SubscriberEmail } from "./SubscriberEmail.js"
import { SubscriberName } from "./SubscriberName.js"

const NewSubscriberSchema = Schema.Struct({
  email: SubscriberEmail.schema,
  name: SubscriberName.schema
})

export type NewSubscriber = typeof NewSubscriberSchema.Type

export const NewSubscriber = {
  schema: NewSubscriberSchema,

  fromForm: (
    rawEmail: string,
    rawName: string
  ): Either.Either<NewSubscriber, SubscriberValidationError> =>
    Either.gen(function* () {
      const email = yield* SubscriberEmail.parse(rawEmail)
      const name = yield* SubscriberName.parse(rawName)
      return { email, name }
    }),

  // Trusted inputs only (fixtures); throws on invalid data
  make: (raw: typeof NewSubscriberSchema.Encoded): NewSubscriber =>
    Schema.decodeSync(NewSubscriberSchema)(raw)
}
