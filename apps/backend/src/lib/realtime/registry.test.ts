import { describe, expect, test } from "vitest"
import type { CloseCode } from "@murmur/types"
import { DuplicateConnectionError, SubscriptionLimitExceededError } from "../errors"
import { ConnectionRegistry, type ConnectionHandle } from "./registry"

interface RecordingHandle extends ConnectionHandle {
  sent: string[]
  closed: Array<{ code: CloseCode; reason: string }>
}

function createHandle(connectionId: string): RecordingHandle {
  const sent: string[] = []
  const closed: Array<{ code: CloseCode; reason: string }> = []
  return {
    connectionId,
    sent,
    closed,
    send: (data) => {
      sent.push(data)
    },
    close: (code, reason) => {
      closed.push({ code, reason })
    },
  }
}

function ids(handles: ConnectionHandle[]): string[] {
  return handles.map((h) => h.connectionId).sort()
}

describe("ConnectionRegistry", () => {
  test("register exposes the session with no subscriptions", () => {
    const registry = new ConnectionRegistry({ now: () => 5_000 })
    registry.register("conn_1", "usr_a", createHandle("conn_1"))

    const session = registry.get("conn_1")
    expect(session?.userId).toBe("usr_a")
    expect(session?.connectedAt).toBe(5_000)
    expect(session?.subscriptions.size).toBe(0)
    expect(registry.size).toBe(1)
  })

  test("rejects a duplicate connection id", () => {
    const registry = new ConnectionRegistry()
    registry.register("conn_1", "usr_a", createHandle("conn_1"))

    expect(() => registry.register("conn_1", "usr_b", createHandle("conn_1"))).toThrow(DuplicateConnectionError)
    expect(registry.get("conn_1")?.userId).toBe("usr_a")
  })

  test("fanout returns every connection subscribed to the conversation", () => {
    const registry = new ConnectionRegistry()
    registry.register("conn_1", "usr_a", createHandle("conn_1"))
    registry.register("conn_2", "usr_b", createHandle("conn_2"))
    registry.register("conn_3", "usr_c", createHandle("conn_3"))

    registry.subscribe("conn_1", ["cnv_x"])
    registry.subscribe("conn_2", ["cnv_x", "cnv_y"])
    registry.subscribe("conn_3", ["cnv_y"])

    expect(ids(registry.fanout("cnv_x"))).toEqual(["conn_1", "conn_2"])
    expect(ids(registry.fanout("cnv_y"))).toEqual(["conn_2", "conn_3"])
    expect(registry.fanout("cnv_none")).toEqual([])
  })

  test("subscribe dedupes and is idempotent", () => {
    const registry = new ConnectionRegistry()
    registry.register("conn_1", "usr_a", createHandle("conn_1"))

    expect(registry.subscribe("conn_1", ["cnv_x", "cnv_x", "cnv_y"])).toEqual(["cnv_x", "cnv_y"])
    expect(registry.subscribe("conn_1", ["cnv_x"])).toEqual(["cnv_x"])

    expect([...(registry.get("conn_1")?.subscriptions ?? [])]).toEqual(["cnv_x", "cnv_y"])
    expect(registry.fanout("cnv_x")).toHaveLength(1)
  })

  test("subscribe over the limit applies nothing", () => {
    const registry = new ConnectionRegistry({ maxSubscriptionsPerConnection: 2 })
    registry.register("conn_1", "usr_a", createHandle("conn_1"))
    registry.subscribe("conn_1", ["cnv_a"])

    expect(() => registry.subscribe("conn_1", ["cnv_b", "cnv_c"])).toThrow(SubscriptionLimitExceededError)
    expect([...(registry.get("conn_1")?.subscriptions ?? [])]).toEqual(["cnv_a"])
    expect(registry.fanout("cnv_b")).toEqual([])

    // Already-held ids do not count twice
    expect(registry.subscribe("conn_1", ["cnv_a", "cnv_b"])).toEqual(["cnv_a", "cnv_b"])
  })

  test("subscribe on an unknown connection throws", () => {
    const registry = new ConnectionRegistry()
    expect(() => registry.subscribe("conn_missing", ["cnv_x"])).toThrow("Connection conn_missing is not registered")
  })

  test("unsubscribe is idempotent and stops fanout", () => {
    const registry = new ConnectionRegistry()
    registry.register("conn_1", "usr_a", createHandle("conn_1"))
    registry.subscribe("conn_1", ["cnv_x", "cnv_y"])

    expect(registry.unsubscribe("conn_1", ["cnv_x", "cnv_x", "cnv_never"])).toEqual(["cnv_x", "cnv_never"])
    expect(registry.unsubscribe("conn_1", ["cnv_x"])).toEqual(["cnv_x"])

    expect(registry.fanout("cnv_x")).toEqual([])
    expect(ids(registry.fanout("cnv_y"))).toEqual(["conn_1"])
  })

  test("fanout returns a snapshot unaffected by later changes", () => {
    const registry = new ConnectionRegistry()
    registry.register("conn_1", "usr_a", createHandle("conn_1"))
    registry.register("conn_2", "usr_b", createHandle("conn_2"))
    registry.subscribe("conn_1", ["cnv_x"])
    registry.subscribe("conn_2", ["cnv_x"])

    const snapshot = registry.fanout("cnv_x")
    registry.deregister("conn_1")

    expect(ids(snapshot)).toEqual(["conn_1", "conn_2"])
    expect(ids(registry.fanout("cnv_x"))).toEqual(["conn_2"])
  })

  test("deregister removes every subscription once", () => {
    const registry = new ConnectionRegistry()
    registry.register("conn_1", "usr_a", createHandle("conn_1"))
    registry.subscribe("conn_1", ["cnv_x", "cnv_y"])

    expect(registry.deregister("conn_1")).toBe(true)
    expect(registry.deregister("conn_1")).toBe(false)

    expect(registry.get("conn_1")).toBeUndefined()
    expect(registry.fanout("cnv_x")).toEqual([])
    expect(registry.fanout("cnv_y")).toEqual([])
    expect(registry.size).toBe(0)
  })

  test("unsubscribe then resubscribe leaves only the last operation in effect", () => {
    const registry = new ConnectionRegistry()
    const handle = createHandle("conn_1")
    registry.register("conn_1", "usr_a", handle)
    registry.subscribe("conn_1", ["cnv_x", "cnv_y"])

    registry.unsubscribe("conn_1", ["cnv_x"])
    registry.subscribe("conn_1", ["cnv_x"])
    registry.unsubscribe("conn_1", ["cnv_y"])

    expect([...(registry.get("conn_1")?.subscriptions ?? [])].sort()).toEqual(["cnv_x"])
    expect(registry.fanout("cnv_x")).toEqual([handle])
    expect(registry.fanout("cnv_y")).toEqual([])
  })

  test("touch updates last activity", () => {
    let now = 1_000
    const registry = new ConnectionRegistry({ now: () => now })
    registry.register("conn_1", "usr_a", createHandle("conn_1"))

    now = 4_000
    registry.touch("conn_1")
    registry.touch("conn_unknown")

    expect(registry.get("conn_1")?.lastActivityAt).toBe(4_000)
    expect(registry.size).toBe(1)
  })
})
