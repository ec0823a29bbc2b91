// =============================================================================
// EmailService — The Port (Interface)
// =============================================================================
//
// HEXAGONAL ARCHITECTURE:
// The subscribe use case depends on this port. Adapters:
//   - HttpEmailService: the transactional-email provider's HTTP API
//   - ConsoleEmailService: logs instead of sending (local runs, tests)
//
// The sender address is adapter configuration, fixed at startup, so it is
// not part of EmailContent.
//
import { Context, Effect } from "effect"

export { SubscriberEmail } from "./domain/subscriber/SubscriberEmail.js"
import type { SubscriberEmail } from "./domain/subscriber/SubscriberEmail.js"

// Recipient must be a validated address; nothing else is ever dispatched.
export interface EmailContent {
  readonly to: SubscriberEmail
  readonly subject: string
  readonly htmlBody: string
  readonly textBody: string
}

// =============================================================================
// EmailService Errors
// =============================================================================
//
// Provider unreachable, timed out, or answered with a non-2xx status.
// `message` is safe to log; it never contains the provider token.
//

export type EmailSendError = {
  readonly _tag: "EmailSendError"
  readonly message: string
  readonly cause?: unknown
}

export type EmailError = EmailSendError

// =============================================================================
// EmailService Interface + Tag
// =============================================================================

export interface EmailServiceInterface {
  /**
   * Send one email. Exactly one attempt: no retry.
   */
  readonly send: (email: EmailContent) => Effect.Effect<void, EmailError>
}

export class EmailService extends Context.Tag("EmailService")<
  EmailService,
  EmailServiceInterface
>() {}
