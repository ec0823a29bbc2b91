import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { SubscriberEmail } from "../../src/EmailService.js"
import {
  makeCaptureEmailService,
  makeConsoleEmailService
} from "../../src/infrastructure/ConsoleEmailService.js"
import { makeLogCapture } from "../support/LogCapture.js"

// =============================================================================
// Test Fixtures
// =============================================================================

const welcome = {
  to: SubscriberEmail.make("ursula_le_guin@gmail.com"),
  subject: "Welcome",
  htmlBody: "<p>Hi</p>",
  textBody: "Hi"
}

describe("ConsoleEmailService", () => {
  it.effect("logs the email instead of sending it", () => {
    const logs = makeLogCapture()
    return Effect.gen(function* () {
      yield* makeConsoleEmailService().send(welcome)

      expect(logs.logs()).toEqual([
        {
          level: "INFO",
          message: "Email not dispatched: no provider configured",
          annotations: {
            email_to: "ursula_le_guin@gmail.com",
            email_subject: "Welcome",
            email_text_body: "Hi"
          }
        }
      ])
    }).pipe(Effect.provide(logs.layer))
  })
})

describe("makeCaptureEmailService", () => {
  it.effect("records sent emails in order", () =>
    Effect.gen(function* () {
      const capture = makeCaptureEmailService()

      yield* capture.service.send(welcome)
      yield* capture.service.send({ ...welcome, subject: "Again" })

      expect(capture.getSentEmails().map((e) => e.subject)).toEqual(["Welcome", "Again"])
    })
  )

  it.effect("records the attempt and then fails when told to", () =>
    Effect.gen(function* () {
      const capture = makeCaptureEmailService({
        failWith: { _tag: "EmailSendError", message: "Email provider responded with status 503" }
      })

      const error = yield* Effect.flip(capture.service.send(welcome))

      expect(error.message).toBe("Email provider responded with status 503")
      expect(capture.getSentEmails()).toEqual([welcome])
    })
  )

  it("instances do not share state", () => {
    const first = makeCaptureEmailService()
    const second = makeCaptureEmailService()

    Effect.runSync(first.service.send(welcome))

    expect(first.getSentEmails()).toHaveLength(1)
    expect(second.getSentEmails()).toHaveLength(0)
  })
})
