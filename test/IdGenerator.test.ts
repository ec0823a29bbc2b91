import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import {
  IdGenerator,
  makeTestIdGenerator,
  TestIdGeneratorLive,
  UuidIdGenerator
} from "../src/IdGenerator.js"

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe("makeTestIdGenerator", () => {
  it.effect("counts each kind of id separately", () =>
    Effect.gen(function* () {
      const generator = makeTestIdGenerator()

      expect(yield* generator.subscriptionId()).toBe("subscription-1")
      expect(yield* generator.requestId()).toBe("request-1")
      expect(yield* generator.subscriptionId()).toBe("subscription-2")
      expect(yield* makeTestIdGenerator().subscriptionId()).toBe("subscription-1")
    })
  )
})

describe("TestIdGeneratorLive", () => {
  it.effect("starts a fresh sequence on each build", () =>
    Effect.gen(function* () {
      const nextRequestId = Effect.flatMap(IdGenerator, (generator) => generator.requestId())

      const first = yield* nextRequestId.pipe(Effect.provide(TestIdGeneratorLive))
      const second = yield* nextRequestId.pipe(Effect.provide(TestIdGeneratorLive))

      expect([first, second]).toEqual(["request-1", "request-1"])
    })
  )
})

describe("UuidIdGenerator", () => {
  it.effect("returns distinct v4 uuids", () =>
    Effect.gen(function* () {
      const subscriptionId = yield* UuidIdGenerator.subscriptionId()
      const requestId = yield* UuidIdGenerator.requestId()

      expect(subscriptionId).toMatch(UUID_V4)
      expect(requestId).toMatch(UUID_V4)
      expect(subscriptionId).not.toBe(requestId)
    })
  )
})
