// =============================================================================
// SubscriberEmail — parsing untrusted input
// =============================================================================
import { describe, expect, it } from "@effect/vitest"
import { Either, FastCheck } from "effect"
import { SubscriberEmail } from "../../../src/domain/subscriber/SubscriberEmail.js"
import { SubscriberValidationError } from "../../../src/domain/subscriber/Errors.js"

const localOrDomainPart = FastCheck.stringMatching(/^[a-z0-9._-]{1,16}$/)

describe("SubscriberEmail.parse", () => {
  it("accepts a well-formed address and keeps it unchanged", () => {
    expect(SubscriberEmail.parse("ursula_le_guin@gmail.com")).toEqual(
      Either.right("ursula_le_guin@gmail.com")
    )
  })

  it("does not require a dot in the domain", () => {
    expect(Either.isRight(SubscriberEmail.parse("admin@localhost"))).toBe(true)
  })

  it.each([
    ["empty", ""],
    ["single whitespace", " "],
    ["only whitespace", " \t \r \n   "],
    ["whitespace in local part", "john doe@domain.yq"],
    ["whitespace in domain", "john_doe@dom ain.yq"],
    ["trailing newline", "john_doe@domain.yq\n"],
    ["missing @", "john.doeATdomain.yq"],
    ["missing local part", "@domain.yq"],
    ["missing domain", "john.doe@"],
    ["two @", "john@doe@domain.yq"]
  ])("rejects %s", (_, raw) => {
    expect(Either.isLeft(SubscriberEmail.parse(raw))).toBe(true)
  })

  it("reports the offending input in the error", () => {
    expect(SubscriberEmail.parse("john.doe@")).toEqual(
      Either.left({
        _tag: "SubscriberValidationError",
        field: "email",
        input: "john.doe@",
        message: "\"john.doe@\" is not a valid subscriber email."
      })
    )
  })

  it("rejects every string without an @", () => {
    FastCheck.assert(
      FastCheck.property(
        FastCheck.string().filter((s) => !s.includes("@")),
        (raw) => Either.isLeft(SubscriberEmail.parse(raw))
      )
    )
  })

  it("accepts local@domain and rejects it once whitespace is inserted", () => {
    FastCheck.assert(
      FastCheck.property(
        localOrDomainPart,
        localOrDomainPart,
        FastCheck.constantFrom(" ", "\t", "\n", "\u00A0"),
        (local, domain, whitespace) => {
          expect(Either.isRight(SubscriberEmail.parse(`${local}@${domain}`))).toBe(true)
          expect(SubscriberEmail.parse(`${local}@${whitespace}${domain}`)).toEqual(
            Either.left(SubscriberValidationError("email", `${local}@${whitespace}${domain}`))
          )
        }
      )
    )
  })
})

describe("SubscriberEmail.make", () => {
  it("returns the value for a valid address", () => {
    expect(SubscriberEmail.make("john.doe@domain.yq")).toBe("john.doe@domain.yq")
  })

  it("throws for an invalid address", () => {
    expect(() => SubscriberEmail.make("john.doe@")).toThrow()
  })
})
