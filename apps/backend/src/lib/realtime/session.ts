import {
  ClientOps,
  CloseCodes,
  RealtimeErrorCodes,
  type ClientCommand,
  type CloseCode,
  type RealtimeErrorCode,
  type ServerFrame,
  type SubscribeCommand,
  type UnsubscribeCommand,
} from "@murmur/types"
import type { CredentialVerifier } from "../../features/auth"
import type { MembershipChecker } from "../../features/conversations"
import type { RealtimeConfig } from "../env"
import { ProtocolError, SubscriptionLimitExceededError, TokenExpiredError, UnauthorizedError } from "../errors"
import { FixedWindowLimiter } from "../fixed-window"
import { connectionId as generateConnectionId } from "../id"
import { logger } from "../logger"
import { ackFrame, decodeCommand, errorFrame, pongFrame, welcomeFrame } from "./protocol"
import type { ConnectionHandle, ConnectionRegistry } from "./registry"

export type SessionState = "connecting" | "authenticating" | "open" | "closing" | "closed"

/**
 * The socket as seen by a session. `send` throws when the frame cannot be
 * written; `close` starts the closing handshake and the owner later reports the
 * socket closed through `ProtocolSession.handleTransportClose`.
 */
export interface Transport {
  send(data: string): void
  close(code: CloseCode, reason: string): void
}

export interface ProtocolSessionDeps {
  registry: ConnectionRegistry
  verifier: CredentialVerifier
  membership: MembershipChecker
  config: RealtimeConfig
  connectionId?: string
  now?: () => Date
}

class HandshakeTimeoutError extends UnauthorizedError {
  constructor() {
    super("Authentication timed out")
    this.name = "HandshakeTimeoutError"
  }
}

function dedupe(ids: string[]): string[] {
  return [...new Set(ids)]
}

/**
 * One WebSocket connection's protocol state machine:
 * connecting -> authenticating -> open -> closing -> closed.
 *
 * Failed authentication goes from authenticating straight to closed. Leaving
 * `open` deregisters the connection exactly once.
 */
export class ProtocolSession {
  readonly connectionId: string

  private stateValue: SessionState = "connecting"
  private userIdValue: string | null = null
  private registered = false
  private idleTimer: ReturnType<typeof setTimeout> | null = null
  private commandChain: Promise<void> = Promise.resolve()
  private readonly limiter: FixedWindowLimiter
  private readonly handle: ConnectionHandle
  private readonly registry: ConnectionRegistry
  private readonly verifier: CredentialVerifier
  private readonly membership: MembershipChecker
  private readonly config: RealtimeConfig
  private readonly now: () => Date

  constructor(
    private readonly transport: Transport,
    deps: ProtocolSessionDeps
  ) {
    this.connectionId = deps.connectionId ?? generateConnectionId()
    this.registry = deps.registry
    this.verifier = deps.verifier
    this.membership = deps.membership
    this.config = deps.config
    this.now = deps.now ?? (() => new Date())
    this.limiter = new FixedWindowLimiter({
      windowMs: deps.config.rateLimitWindowMs,
      max: deps.config.rateLimitMaxCommands,
    })
    this.handle = {
      connectionId: this.connectionId,
      send: (data) => this.transport.send(data),
      close: (code, reason) => this.close(code, reason),
    }
  }

  get state(): SessionState {
    return this.stateValue
  }

  get userId(): string | null {
    return this.userIdValue
  }

  /**
   * Runs the handshake with the credential taken from the upgrade request.
   * Resolves once the session is open or closed.
   */
  async authenticate(credential: string | null): Promise<void> {
    if (this.stateValue !== "connecting") return
    this.stateValue = "authenticating"

    let userId: string
    try {
      if (!credential) {
        throw new UnauthorizedError("Missing credentials")
      }
      userId = await this.verifyWithTimeout(credential)
    } catch (err) {
      this.rejectHandshake(err)
      return
    }

    // The client may have gone away while we were verifying
    if (this.stateValue !== "authenticating") return

    this.userIdValue = userId
    try {
      this.registry.register(this.connectionId, userId, this.handle)
    } catch (err) {
      logger.error({ err, connectionId: this.connectionId, userId }, "Failed to register realtime session")
      this.sendError(RealtimeErrorCodes.INTERNAL_ERROR, "Internal error")
      this.close(CloseCodes.INTERNAL_ERROR, "Registration failed")
      return
    }
    this.registered = true
    this.stateValue = "open"

    this.sendFrame(
      welcomeFrame({
        connectionId: this.connectionId,
        userId,
        serverTime: this.now(),
        heartbeatSec: this.config.heartbeatSec,
      })
    )
    this.armIdleTimer()

    logger.info({ connectionId: this.connectionId, userId }, "Realtime session opened")
  }

  /**
   * Handles one inbound text frame. Frames outside the open state are ignored.
   * Idle and rate accounting happen on arrival; the commands themselves run
   * strictly in arrival order.
   */
  handleMessage(raw: string): Promise<void> {
    if (this.stateValue !== "open") return this.commandChain

    this.armIdleTimer()
    this.registry.touch(this.connectionId)

    const decision = this.limiter.take(this.connectionId)
    if (!decision.allowed) {
      this.sendError(RealtimeErrorCodes.RATE_LIMITED, "Too many commands", {
        retry_after_ms: Math.max(0, decision.resetAt - Date.now()),
      })
      return this.commandChain
    }

    const next = this.commandChain.then(() => this.processCommand(raw))
    this.commandChain = next
    return next
  }

  /**
   * Server-initiated close (idle timeout, slow consumer, revocation, shutdown).
   */
  close(code: CloseCode, reason: string): void {
    if (this.stateValue === "closing" || this.stateValue === "closed") return

    this.stateValue = "closing"
    this.teardown()
    this.closeTransport(code, reason)
  }

  /**
   * The socket is gone, whoever closed it.
   */
  handleTransportClose(): void {
    if (this.stateValue === "closed") return

    this.teardown()
    this.stateValue = "closed"
  }

  private async processCommand(raw: string): Promise<void> {
    if (this.stateValue !== "open") return

    try {
      const command = decodeCommand(raw, this.config.maxCommandBytes)
      await this.dispatch(command)
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.sendError(err.code, err.message, err.details)
        return
      }
      logger.error({ err, connectionId: this.connectionId, userId: this.userIdValue }, "Realtime command failed")
      this.sendError(RealtimeErrorCodes.INTERNAL_ERROR, "Internal error")
    }
  }

  private async dispatch(command: ClientCommand): Promise<void> {
    switch (command.op) {
      case ClientOps.SUBSCRIBE:
        return this.handleSubscribe(command)
      case ClientOps.UNSUBSCRIBE:
        return this.handleUnsubscribe(command)
      case ClientOps.PING:
        this.sendFrame(pongFrame(command.ts))
        return
    }
  }

  private async handleSubscribe(command: SubscribeCommand): Promise<void> {
    const userId = this.requireUserId()
    const ids = dedupe(command.conversation_ids)

    if (ids.length > this.config.maxIdsPerSubscribe) {
      throw new ProtocolError(
        RealtimeErrorCodes.INVALID_COMMAND,
        `At most ${this.config.maxIdsPerSubscribe} conversation ids per command`
      )
    }

    let memberIds: Set<string>
    try {
      memberIds = new Set(await this.membership.memberConversationIds(userId, ids))
    } catch (err) {
      logger.error({ err, connectionId: this.connectionId, userId }, "Membership lookup failed")
      throw new ProtocolError(RealtimeErrorCodes.INTERNAL_ERROR, "Membership lookup failed")
    }

    // Closed while the lookup was in flight
    if (this.stateValue !== "open") return

    const accepted = ids.filter((id) => memberIds.has(id))
    const rejected = ids.filter((id) => !memberIds.has(id))

    try {
      this.registry.subscribe(this.connectionId, accepted)
    } catch (err) {
      if (err instanceof SubscriptionLimitExceededError) {
        throw new ProtocolError(RealtimeErrorCodes.INVALID_COMMAND, "Subscription limit exceeded", {
          limit: err.limit,
        })
      }
      throw err
    }

    this.sendFrame(ackFrame(ClientOps.SUBSCRIBE, accepted, rejected))

    if (rejected.length > 0) {
      this.sendError(RealtimeErrorCodes.FORBIDDEN_CONVERSATION, "Not a member of one or more conversations", {
        conversation_ids: rejected,
      })
    }

    logger.debug({ connectionId: this.connectionId, userId, accepted, rejected }, "Subscribed")
  }

  private handleUnsubscribe(command: UnsubscribeCommand): void {
    const removed = this.registry.unsubscribe(this.connectionId, command.conversation_ids)
    this.sendFrame(ackFrame(ClientOps.UNSUBSCRIBE, removed))
  }

  private verifyWithTimeout(credential: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => reject(new HandshakeTimeoutError()), this.config.handshakeTimeoutMs)

      this.verifier.verify(credential).then(
        (userId) => {
          clearTimeout(timer)
          resolve(userId)
        },
        (err: unknown) => {
          clearTimeout(timer)
          reject(err)
        }
      )
    })
  }

  private rejectHandshake(err: unknown): void {
    const code: RealtimeErrorCode =
      err instanceof TokenExpiredError ? RealtimeErrorCodes.TOKEN_EXPIRED : RealtimeErrorCodes.UNAUTHORIZED

    let message = "Invalid credentials"
    if (err instanceof UnauthorizedError || err instanceof TokenExpiredError) {
      message = err.message
      logger.info({ connectionId: this.connectionId, code }, "Realtime handshake rejected")
    } else {
      logger.error({ err, connectionId: this.connectionId }, "Credential verification failed unexpectedly")
    }

    if (this.stateValue === "authenticating") {
      this.sendError(code, message)
      this.closeTransport(CloseCodes.POLICY_VIOLATION, code)
    }
    this.stateValue = "closed"
  }

  private requireUserId(): string {
    if (this.userIdValue === null) {
      throw new ProtocolError(RealtimeErrorCodes.UNAUTHORIZED, "Not authenticated")
    }
    return this.userIdValue
  }

  private armIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer)
    }
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null
      logger.info({ connectionId: this.connectionId, userId: this.userIdValue }, "Closing idle realtime session")
      this.close(CloseCodes.GOING_AWAY, "Idle timeout")
    }, this.config.idleTimeoutMs)
  }

  private teardown(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer)
      this.idleTimer = null
    }

    if (this.registered) {
      this.registered = false
      this.registry.deregister(this.connectionId)
      this.limiter.forget(this.connectionId)
      logger.info({ connectionId: this.connectionId, userId: this.userIdValue }, "Realtime session closed")
    }
  }

  private sendError(code: RealtimeErrorCode, message: string, details?: Record<string, unknown>): void {
    this.sendFrame(errorFrame(code, message, details))
  }

  private sendFrame(frame: ServerFrame): void {
    try {
      this.transport.send(JSON.stringify(frame))
    } catch (err) {
      logger.warn({ err, connectionId: this.connectionId }, "Failed to write frame, closing")
      this.close(CloseCodes.TRY_AGAIN_LATER, "Write failed")
    }
  }

  private closeTransport(code: CloseCode, reason: string): void {
    try {
      this.transport.close(code, reason)
    } catch (err) {
      logger.debug({ err, connectionId: this.connectionId }, "Transport close failed")
    }
  }
}
