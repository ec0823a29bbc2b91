import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { NewSubscriber } from "../../src/domain/subscriber/NewSubscriber.js"
import { makeCaptureEmailService } from "../../src/infrastructure/ConsoleEmailService.js"
import {
  CONFIRMATION_SUBJECT,
  confirmationEmailFor,
  reactToNewSubscriber
} from "../../src/reactions/SubscriberReactions.js"

describe("confirmationEmailFor", () => {
  it("greets the subscriber by trimmed name in both bodies", () => {
    const subscriber = NewSubscriber.make({ email: "ursula_le_guin@gmail.com", name: "  le guin " })

    expect(confirmationEmailFor(subscriber)).toEqual({
      to: "ursula_le_guin@gmail.com",
      subject: "Welcome to our newsletter!",
      htmlBody:
        "<p>Hi le guin,</p><p>Welcome to our newsletter! You are now subscribed with ursula_le_guin@gmail.com.</p>",
      textBody: "Hi le guin,\n\nWelcome to our newsletter! You are now subscribed with ursula_le_guin@gmail.com."
    })
  })

  it("escapes the name in the HTML body only", () => {
    const email = confirmationEmailFor(NewSubscriber.make({ email: "tom@jerry.com", name: "Tom & Jerry" }))

    expect(email.htmlBody).toBe(
      "<p>Hi Tom &amp; Jerry,</p><p>Welcome to our newsletter! You are now subscribed with tom@jerry.com.</p>"
    )
    expect(email.textBody.startsWith("Hi Tom & Jerry,")).toBe(true)
  })
})

describe("reactToNewSubscriber", () => {
  it.effect("sends exactly one confirmation email", () => {
    const capture = makeCaptureEmailService()
    return Effect.gen(function* () {
      yield* reactToNewSubscriber(NewSubscriber.make({ email: "a@b.com", name: "ab" }))

      const sent = capture.getSentEmails()
      expect(sent).toHaveLength(1)
      expect(sent[0]?.to).toBe("a@b.com")
      expect(sent[0]?.subject).toBe(CONFIRMATION_SUBJECT)
    }).pipe(Effect.provide(capture.layer))
  })
})
