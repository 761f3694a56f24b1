import { describe, expect, test } from "vitest"
import { ConversationNotFoundError } from "../../lib/errors"
import { conversationIdParam } from "./handlers"

describe("conversationIdParam", () => {
  test("returns the route's conversation id", () => {
    expect(conversationIdParam({ params: { conversationId: "cnv_1" } })).toBe("cnv_1")
  })

  test("treats a missing or empty id as an unknown conversation", () => {
    expect(() => conversationIdParam({ params: {} })).toThrow(ConversationNotFoundError)
    expect(() => conversationIdParam({ params: { conversationId: "" } })).toThrow(ConversationNotFoundError)
  })
})
