// =============================================================================
// Subscriber Reactions — what happens after a subscription is stored
// =============================================================================
//
// A newly persisted subscriber gets one confirmation email. Content is
// inline: plain strings, no templating.
//
// Returns Effect<void, EmailError, EmailService>. The caller decides what a
// failure means (the subscribe use case logs it and moves on).
//
import { Effect } from "effect"
import { EmailService, type EmailContent, type EmailError } from "../EmailService.js"
import type { NewSubscriber } from "../domain/subscriber/NewSubscriber.js"

export const CONFIRMATION_SUBJECT = "Welcome to our newsletter!"

// Names cannot contain < > " (see SubscriberName); & still needs escaping.
const escapeHtml = (text: string): string =>
  text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")

export const confirmationEmailFor = (subscriber: NewSubscriber): EmailContent => {
  const name = subscriber.name.trim()
  return {
    to: subscriber.email,
    subject: CONFIRMATION_SUBJECT,
    htmlBody: `<p>Hi ${escapeHtml(name)},</p><p>Welcome to our newsletter! You are now subscribed with ${escapeHtml(subscriber.email)}.</p>`,
    textBody: `Hi ${name},\n\nWelcome to our newsletter! You are now subscribed with ${subscriber.email}.`
  }
}

export const reactToNewSubscriber = (
  subscriber: NewSubscriber
): Effect.Effect<void, EmailError, EmailService> =>
  Effect.gen(function* () {
    const emailService = yield* EmailService
    yield* emailService.send(confirmationEmailFor(subscriber))
  })
