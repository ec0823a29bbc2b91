// =============================================================================
// HttpEmailService — Adapter for the transactional-email provider
// =============================================================================
//
// PROVIDER CONTRACT:
//   POST {baseUrl}/email
//   X-Provider-Auth-Token: <secret>
//   { "from", "to", "subject", "html_body", "text_body" }
//   success = any 2xx
//
// One request per `send`. No retry. A timeout is applied only when one is
// configured; otherwise the HttpClient's own behavior applies.
//
// The token is held as Redacted and only unwrapped into the header. Error
// messages are built from status codes and failure reasons, never from the
// request.
//
import type { Cause, Duration } from "effect"
import { Effect, Layer, Redacted } from "effect"
import {
  HttpClient,
  type HttpClientError,
  HttpClientRequest
} from "@effect/platform"
import {
  EmailService,
  type EmailContent,
  type EmailSendError,
  type EmailServiceInterface,
  type SubscriberEmail
} from "../EmailService.js"

export const AUTH_TOKEN_HEADER = "X-Provider-Auth-Token"

export interface HttpEmailServiceConfig {
  readonly baseUrl: string
  readonly sender: SubscriberEmail
  readonly authorizationToken: Redacted.Redacted
  readonly timeout?: Duration.DurationInput
}

// Provider casing, not ours
interface SendEmailRequest {
  readonly from: string
  readonly to: string
  readonly subject: string
  readonly html_body: string
  readonly text_body: string
}

const describeFailure = (
  error: HttpClientError.HttpClientError | Cause.TimeoutException
): string => {
  switch (error._tag) {
    case "ResponseError":
      return `Email provider responded with status ${error.response.status}`
    case "RequestError":
      return `Email provider request failed (${error.reason})`
    case "TimeoutException":
      return "Email provider did not respond in time"
  }
}

export const makeHttpEmailService = (
  config: HttpEmailServiceConfig
): Effect.Effect<EmailServiceInterface, never, HttpClient.HttpClient> =>
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk)
    const url = `${config.baseUrl.replace(/\/+$/, "")}/email`

    const withTimeout = <A, E>(
      effect: Effect.Effect<A, E>
    ): Effect.Effect<A, E | Cause.TimeoutException> =>
      config.timeout === undefined ? effect : Effect.timeout(effect, config.timeout)

    return {
      send: (email: EmailContent) => {
        const body: SendEmailRequest = {
          from: config.sender,
          to: email.to,
          subject: email.subject,
          html_body: email.htmlBody,
          text_body: email.textBody
        }
        const request = HttpClientRequest.post(url).pipe(
          HttpClientRequest.setHeader(AUTH_TOKEN_HEADER, Redacted.value(config.authorizationToken)),
          HttpClientRequest.bodyUnsafeJson(body)
        )

        // The body is read (and dropped) so the connection is released
        const exchange = client.execute(request).pipe(
          Effect.flatMap((response) => response.text)
        )

        return withTimeout(exchange).pipe(
          Effect.asVoid,
          Effect.catchAll((error) =>
            Effect.fail<EmailSendError>({
              _tag: "EmailSendError",
              message: describeFailure(error),
              cause: error
            })
          ),
          Effect.withSpan("Sending an email through the provider", {
            attributes: { email_to: email.to }
          })
        )
      }
    }
  })

// Requires an HttpClient (FetchHttpClient.layer in Program.ts, a fake in tests)
export const HttpEmailService = (
  config: HttpEmailServiceConfig
): Layer.Layer<EmailService, never, HttpClient.HttpClient> =>
  Layer.effect(EmailService, makeHttpEmailService(config))
