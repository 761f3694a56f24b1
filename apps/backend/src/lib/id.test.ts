import { describe, test, expect } from "vitest"
import { connectionId, eventId, messageId } from "./id"

describe("ID Generation", () => {
  describe("format", () => {
    const testCases = [
      { name: "messageId", fn: messageId, prefix: "msg" },
      { name: "eventId", fn: eventId, prefix: "evt" },
      { name: "connectionId", fn: connectionId, prefix: "conn" },
    ]

    for (const { name, fn, prefix } of testCases) {
      test(`${name} has correct prefix '${prefix}_'`, () => {
        expect(fn().startsWith(`${prefix}_`)).toBe(true)
      })

      test(`${name} has valid ULID format after prefix`, () => {
        const parts = fn().split("_")
        expect(parts).toHaveLength(2)
        // Crockford base32, no I, L, O, U
        expect(parts[1]).toMatch(/^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/)
      })
    }
  })

  test("successive ids differ", () => {
    expect(messageId()).not.toBe(messageId())
  })
})
