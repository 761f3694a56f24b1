import type { CloseCode } from "@murmur/types"
import { DuplicateConnectionError, SubscriptionLimitExceededError } from "../errors"

/**
 * What the registry holds for writing to a connection. Implemented over the
 * socket by the protocol session.
 */
export interface ConnectionHandle {
  readonly connectionId: string
  /** Throws when the frame cannot be written (closed socket, slow consumer) */
  send(data: string): void
  /** Closes the connection; its owner deregisters it from the registry */
  close(code: CloseCode, reason: string): void
}

export interface Session {
  readonly connectionId: string
  readonly userId: string
  readonly handle: ConnectionHandle
  readonly subscriptions: ReadonlySet<string>
  readonly connectedAt: number
  readonly lastActivityAt: number
}

interface SessionEntry {
  connectionId: string
  userId: string
  handle: ConnectionHandle
  subscriptions: Set<string>
  connectedAt: number
  lastActivityAt: number
}

export interface ConnectionRegistryOptions {
  maxSubscriptionsPerConnection?: number
  now?: () => number
}

const DEFAULT_MAX_SUBSCRIPTIONS = 100

function addToIndex(index: Map<string, Set<string>>, key: string, value: string): void {
  let values = index.get(key)
  if (!values) {
    values = new Set()
    index.set(key, values)
  }
  values.add(value)
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, value: string): void {
  const values = index.get(key)
  if (values) {
    values.delete(value)
    if (values.size === 0) {
      index.delete(key)
    }
  }
}

/**
 * In-memory registry of open sessions and their subscriptions.
 *
 * Every method is synchronous, so on the event loop each call is atomic with
 * respect to the others. `fanout` hands back a snapshot; socket writes happen
 * on that copy, outside the registry.
 */
export class ConnectionRegistry {
  private readonly sessions = new Map<string, SessionEntry>()
  private readonly conversationIndex = new Map<string, Set<string>>()
  private readonly maxSubscriptions: number
  private readonly now: () => number

  constructor(options: ConnectionRegistryOptions = {}) {
    this.maxSubscriptions = options.maxSubscriptionsPerConnection ?? DEFAULT_MAX_SUBSCRIPTIONS
    this.now = options.now ?? Date.now
  }

  get size(): number {
    return this.sessions.size
  }

  register(connectionId: string, userId: string, handle: ConnectionHandle): Session {
    if (this.sessions.has(connectionId)) {
      throw new DuplicateConnectionError(connectionId)
    }

    const now = this.now()
    const entry: SessionEntry = {
      connectionId,
      userId,
      handle,
      subscriptions: new Set(),
      connectedAt: now,
      lastActivityAt: now,
    }
    this.sessions.set(connectionId, entry)
    return entry
  }

  get(connectionId: string): Session | undefined {
    return this.sessions.get(connectionId)
  }

  /**
   * Adds subscriptions and returns the deduplicated ids now covered. Applies
   * nothing when the result would exceed the per-connection limit.
   */
  subscribe(connectionId: string, conversationIds: string[]): string[] {
    const entry = this.requireSession(connectionId)
    const requested = [...new Set(conversationIds)]

    const added = requested.filter((id) => !entry.subscriptions.has(id))
    const total = entry.subscriptions.size + added.length
    if (total > this.maxSubscriptions) {
      throw new SubscriptionLimitExceededError(this.maxSubscriptions, total)
    }

    for (const conversationId of added) {
      entry.subscriptions.add(conversationId)
      addToIndex(this.conversationIndex, conversationId, connectionId)
    }

    return requested
  }

  /**
   * Idempotent; returns the deduplicated ids requested.
   */
  unsubscribe(connectionId: string, conversationIds: string[]): string[] {
    const entry = this.requireSession(connectionId)
    const requested = [...new Set(conversationIds)]

    for (const conversationId of requested) {
      if (entry.subscriptions.delete(conversationId)) {
        removeFromIndex(this.conversationIndex, conversationId, connectionId)
      }
    }

    return requested
  }

  fanout(conversationId: string): ConnectionHandle[] {
    const connectionIds = this.conversationIndex.get(conversationId)
    if (!connectionIds) return []

    const handles: ConnectionHandle[] = []
    for (const connectionId of connectionIds) {
      const entry = this.sessions.get(connectionId)
      if (entry) {
        handles.push(entry.handle)
      }
    }
    return handles
  }

  touch(connectionId: string): void {
    const entry = this.sessions.get(connectionId)
    if (entry) {
      entry.lastActivityAt = this.now()
    }
  }

  /**
   * Removes the session and every subscription it held. Returns false when the
   * connection was not registered.
   */
  deregister(connectionId: string): boolean {
    const entry = this.sessions.get(connectionId)
    if (!entry) return false

    for (const conversationId of entry.subscriptions) {
      removeFromIndex(this.conversationIndex, conversationId, connectionId)
    }
    this.sessions.delete(connectionId)
    return true
  }

  private requireSession(connectionId: string): SessionEntry {
    const entry = this.sessions.get(connectionId)
    if (!entry) {
      throw new Error(`Connection ${connectionId} is not registered`)
    }
    return entry
  }
}
