// =============================================================================
// ConsoleEmailService — Adapter Implementation
// =============================================================================
//
// Used when no email provider is configured (local runs), and in tests.
//
import { Effect, Layer } from "effect"
import {
  EmailService,
  type EmailContent,
  type EmailSendError,
  type EmailServiceInterface
} from "../EmailService.js"

// =============================================================================
// Console Adapter (logs through the Effect logger)
// =============================================================================

export const makeConsoleEmailService = (): EmailServiceInterface => ({
  send: (email: EmailContent) =>
    Effect.logInfo("Email not dispatched: no provider configured").pipe(
      Effect.annotateLogs({
        email_to: email.to,
        email_subject: email.subject,
        email_text_body: email.textBody
      })
    )
})

export const ConsoleEmailService = Layer.succeed(
  EmailService,
  makeConsoleEmailService()
)

// =============================================================================
// Capture Adapter (for tests)
// =============================================================================
//
// Records every attempted send. With `failWith`, each attempt is still
// recorded and then fails, standing in for a provider that is down.
//
//   const capture = makeCaptureEmailService()
//   expect(capture.getSentEmails()).toHaveLength(1)
//

export interface CaptureEmailServiceOptions {
  readonly failWith?: EmailSendError
}

export interface CaptureEmailService {
  readonly service: EmailServiceInterface
  readonly layer: Layer.Layer<EmailService>
  readonly getSentEmails: () => ReadonlyArray<EmailContent>
}

export const makeCaptureEmailService = (
  options: CaptureEmailServiceOptions = {}
): CaptureEmailService => {
  const attempts: EmailContent[] = []
  const { failWith } = options

  const service: EmailServiceInterface = {
    send: (email) =>
      Effect.suspend((): Effect.Effect<void, EmailSendError> => {
        attempts.push(email)
        return failWith === undefined ? Effect.void : Effect.fail(failWith)
      })
  }

  return {
    service,
    layer: Layer.succeed(EmailService, service),
    getSentEmails: () => [...attempts]
  }
}
