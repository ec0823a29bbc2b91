// =============================================================================
// SubscriberName — Value Object
// =============================================================================
//
// A display name that passed every constraint below. Constructible only
// through the schema, like SubscriberEmail.
//
// CONSTRAINTS:
//   1. not empty once surrounding whitespace is trimmed
//   2. at most MAX_NAME_LENGTH grapheme clusters ("å" and "å" both count 1)
//   3. none of FORBIDDEN_NAME_CHARACTERS
//
// The trim is only used for check 1. A valid name is stored untouched,
// surrounding whitespace included.
//
import { Either, Schema } from "effect"
import { SubscriberValidationError } from "./Errors.js"

export const MAX_NAME_LENGTH = 256

export const FORBIDDEN_NAME_CHARACTERS: ReadonlyArray<string> = [
  "/", "(", ")", "\"", "<", ">", "\\", "{", "}"
]

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" })

export const countGraphemes = (value: string): number =>
  Array.from(graphemeSegmenter.segment(value)).length

// All three rules are evaluated; the result is a single yes/no.
export const isValidName = (name: string): boolean => {
  const isEmptyOrWhitespace = name.trim().length === 0
  const isTooLong = countGraphemes(name) > MAX_NAME_LENGTH
  const containsForbiddenCharacter = FORBIDDEN_NAME_CHARACTERS.some((c) => name.includes(c))

  return !(isEmptyOrWhitespace || isTooLong || containsForbiddenCharacter)
}

const SubscriberNameSchema = Schema.String.pipe(
  Schema.filter(isValidName, {
    message: () => "Invalid subscriber name"
  }),
  Schema.brand("SubscriberName")
)

export type SubscriberName = typeof SubscriberNameSchema.Type

const decode = Schema.decodeEither(SubscriberNameSchema)

export const SubscriberName = {
  schema: SubscriberNameSchema,

  parse: (raw: string): Either.Either<SubscriberName, SubscriberValidationError> =>
    decode(raw).pipe(
      Either.mapLeft(() => SubscriberValidationError("name", raw))
    ),

  make: (raw: string): SubscriberName => Schema.decodeSync(SubscriberNameSchema)(raw)
}
