// Realtime protocol version advertised in the welcome frame
export const PROTOCOL_VERSION = 1

// Client commands
export const CLIENT_OPS = ["subscribe", "unsubscribe", "ping"] as const
export type ClientOp = (typeof CLIENT_OPS)[number]

export const ClientOps = {
  SUBSCRIBE: "subscribe",
  UNSUBSCRIBE: "unsubscribe",
  PING: "ping",
} as const satisfies Record<string, ClientOp>

// Durable events carried through the outbox
export const REALTIME_EVENT_TYPES = ["message.created", "conversation.updated"] as const
export type RealtimeEventType = (typeof REALTIME_EVENT_TYPES)[number]

export const RealtimeEventTypes = {
  MESSAGE_CREATED: "message.created",
  CONVERSATION_UPDATED: "conversation.updated",
} as const satisfies Record<string, RealtimeEventType>

// Error codes sent in `error` frames
export const REALTIME_ERROR_CODES = [
  "UNAUTHORIZED",
  "TOKEN_EXPIRED",
  "FORBIDDEN_CONVERSATION",
  "INVALID_COMMAND",
  "RATE_LIMITED",
  "INTERNAL_ERROR",
] as const
export type RealtimeErrorCode = (typeof REALTIME_ERROR_CODES)[number]

export const RealtimeErrorCodes = {
  UNAUTHORIZED: "UNAUTHORIZED",
  TOKEN_EXPIRED: "TOKEN_EXPIRED",
  FORBIDDEN_CONVERSATION: "FORBIDDEN_CONVERSATION",
  INVALID_COMMAND: "INVALID_COMMAND",
  RATE_LIMITED: "RATE_LIMITED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const satisfies Record<string, RealtimeErrorCode>

// WebSocket close codes used by the server
export const CloseCodes = {
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
  TRY_AGAIN_LATER: 1013,
} as const
export type CloseCode = (typeof CloseCodes)[keyof typeof CloseCodes]

// Message limits shared by REST validation and clients
export const CLIENT_MESSAGE_ID_MAX_LENGTH = 64
export const MESSAGE_CONTENT_MAX_LENGTH = 2000
export const MESSAGE_PREVIEW_MAX_LENGTH = 280

export function isRealtimeEventType(value: string): value is RealtimeEventType {
  return REALTIME_EVENT_TYPES.some((type) => type === value)
}
