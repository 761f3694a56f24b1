import type { RealtimeErrorCode } from "@murmur/types"

interface HttpErrorOptions {
  status: number
  code?: string
  cause?: Error
  details?: Record<string, unknown>
}

export class HttpError extends Error {
  readonly status: number
  readonly code?: string
  readonly details?: Record<string, unknown>

  constructor(message: string, { status, code, cause, details }: HttpErrorOptions) {
    super(message, { cause })
    this.status = status
    this.code = code
    this.details = details
    this.name = "HttpError"
  }
}

/**
 * Two writers raced to the same (conversation_id, seq). Never retried with a
 * fresh seq: the transaction aborts and the caller decides.
 */
export class ConflictError extends HttpError {
  constructor(conversationId: string, cause?: Error) {
    super(`Sequence conflict in conversation ${conversationId}`, {
      status: 409,
      code: "SEQ_CONFLICT",
      cause,
    })
    this.name = "ConflictError"
  }
}

export class ClientMessageConflictError extends HttpError {
  constructor(clientMessageId: string) {
    super(`client_message_id "${clientMessageId}" was already used in another conversation`, {
      status: 409,
      code: "CLIENT_MESSAGE_CONFLICT",
    })
    this.name = "ClientMessageConflictError"
  }
}

export class ConversationNotFoundError extends HttpError {
  constructor() {
    super("Conversation not found", {
      status: 404,
      code: "CONVERSATION_NOT_FOUND",
    })
    this.name = "ConversationNotFoundError"
  }
}

export class ForbiddenConversationError extends HttpError {
  constructor() {
    super("Not a member of this conversation", {
      status: 403,
      code: "FORBIDDEN_CONVERSATION",
    })
    this.name = "ForbiddenConversationError"
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Invalid credentials", cause?: Error) {
    super(message, { status: 401, code: "UNAUTHORIZED", cause })
    this.name = "UnauthorizedError"
  }
}

export class TokenExpiredError extends HttpError {
  constructor(cause?: Error) {
    super("Token expired", { status: 401, code: "TOKEN_EXPIRED", cause })
    this.name = "TokenExpiredError"
  }
}

export class DuplicateConnectionError extends Error {
  constructor(readonly connectionId: string) {
    super(`Connection ${connectionId} is already registered`)
    this.name = "DuplicateConnectionError"
  }
}

export class SubscriptionLimitExceededError extends Error {
  constructor(
    readonly limit: number,
    readonly requested: number
  ) {
    super(`Subscription limit exceeded (${requested} > ${limit})`)
    this.name = "SubscriptionLimitExceededError"
  }
}

/**
 * A command the protocol engine refuses. Carries the wire code the client sees.
 */
export class ProtocolError extends Error {
  readonly code: RealtimeErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: RealtimeErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.code = code
    this.details = details
    this.name = "ProtocolError"
  }
}

interface PgErrorFields {
  code?: unknown
  constraint?: unknown
}

function isPgError(error: unknown): error is Error & PgErrorFields {
  return error instanceof Error && "code" in error
}

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!isPgError(error) || error.code !== "23505") return false
  return constraint === undefined || error.constraint === constraint
}

/**
 * Thrown by a connection handle whose socket has more than the allowed amount
 * of data still waiting to be flushed.
 */
export class SlowConsumerError extends Error {
  constructor(
    readonly connectionId: string,
    readonly bufferedBytes: number
  ) {
    super(`Connection ${connectionId} has ${bufferedBytes} bytes buffered`)
    this.name = "SlowConsumerError"
  }
}
