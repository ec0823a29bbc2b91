// =============================================================================
// SubscriberEmail — Value Object
// =============================================================================
//
// A string that is known to be a syntactically valid email address.
// The only way to get one is through the schema below, so every live
// SubscriberEmail is valid by type alone.
//
// GRAMMAR (permissive, real-world):
//   - exactly one "@"
//   - non-empty local part and domain part
//   - no whitespace anywhere
// A "." in the domain is NOT required ("admin@localhost" is accepted).
//
import { Either, Schema } from "effect"
import { SubscriberValidationError } from "./Errors.js"

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/

const SubscriberEmailSchema = Schema.String.pipe(
  Schema.pattern(EMAIL_PATTERN, {
    message: () => "Invalid subscriber email address"
  }),
  Schema.brand("SubscriberEmail")
)

export type SubscriberEmail = typeof SubscriberEmailSchema.Type

const decode = Schema.decodeEither(SubscriberEmailSchema)

// Companion object: schema + constructors
export const SubscriberEmail = {
  schema: SubscriberEmailSchema,

  /**
   * Validate an untrusted string.
   * The value is kept exactly as given: no trimming, no lower-casing.
   */
  parse: (raw: string): Either.Either<SubscriberEmail, SubscriberValidationError> =>
    decode(raw).pipe(
      Either.mapLeft(() => SubscriberValidationError("email", raw))
    ),

  // Throws on invalid input. For fixtures and values validated elsewhere.
  make: (raw: string): SubscriberEmail => Schema.decodeSync(SubscriberEmailSchema)(raw)
}
