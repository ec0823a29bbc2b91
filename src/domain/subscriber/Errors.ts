// =============================================================================
// Subscriber Validation Errors
// =============================================================================
//
// ERRORS AS VALUES:
// Parsing a raw form field either yields a branded value or this error.
// The error is client-caused: it maps to 400 and is never logged as a fault.
//
// One error shape for both fields. Callers learn WHICH field failed, not
// which rule inside that field.
//

export type SubscriberField = "email" | "name"

export type SubscriberValidationError = {
  readonly _tag: "SubscriberValidationError"
  readonly field: SubscriberField
  readonly input: string
  readonly message: string
}

export const SubscriberValidationError = (
  field: SubscriberField,
  input: string
): SubscriberValidationError => ({
  _tag: "SubscriberValidationError",
  field,
  input,
  message: `"${input}" is not a valid subscriber ${field}.`
})
