import { z } from "zod"
import {
  ClientOps,
  PROTOCOL_VERSION,
  RealtimeErrorCodes,
  RealtimeEventTypes,
  isRealtimeEventType,
  type AckFrame,
  type ClientCommand,
  type ConversationUpdatedFrame,
  type ErrorFrame,
  type MessageCreatedFrame,
  type PongFrame,
  type RealtimeErrorCode,
  type WelcomeFrame,
} from "@murmur/types"
import { ProtocolError } from "../errors"
import type { OutboxEvent } from "../outbox"

const CONVERSATION_ID_MAX_LENGTH = 128

const conversationIdsSchema = z
  .array(z.string().min(1).max(CONVERSATION_ID_MAX_LENGTH), { error: "conversation_ids must be an array of ids" })
  .min(1, "conversation_ids must not be empty")

const clientCommandSchema = z.discriminatedUnion("op", [
  z.strictObject({ op: z.literal(ClientOps.SUBSCRIBE), conversation_ids: conversationIdsSchema }),
  z.strictObject({ op: z.literal(ClientOps.UNSUBSCRIBE), conversation_ids: conversationIdsSchema }),
  z.strictObject({ op: z.literal(ClientOps.PING), ts: z.number().int().nullish() }),
])

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return "Invalid command"
  const path = issue.path.map(String).join(".")
  return path ? `${path}: ${issue.message}` : issue.message
}

/**
 * Size check, JSON parse and shape validation of one inbound text frame.
 * Throws ProtocolError(INVALID_COMMAND) for anything that is not a command.
 */
export function decodeCommand(raw: string, maxBytes: number): ClientCommand {
  const size = Buffer.byteLength(raw, "utf8")
  if (size > maxBytes) {
    throw new ProtocolError(RealtimeErrorCodes.INVALID_COMMAND, `Command exceeds ${maxBytes} bytes`, {
      max_bytes: maxBytes,
    })
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw new ProtocolError(RealtimeErrorCodes.INVALID_COMMAND, "Command is not valid JSON")
  }

  const result = clientCommandSchema.safeParse(json)
  if (!result.success) {
    throw new ProtocolError(RealtimeErrorCodes.INVALID_COMMAND, describeIssue(result.error))
  }
  return result.data
}

// ============================================================================
// Outbound
// ============================================================================

export function welcomeFrame(params: {
  connectionId: string
  userId: string
  serverTime: Date
  heartbeatSec: number
}): WelcomeFrame {
  return {
    type: "connection.welcome",
    connection_id: params.connectionId,
    user_id: params.userId,
    server_time: params.serverTime.toISOString(),
    heartbeat_sec: params.heartbeatSec,
    protocol_version: PROTOCOL_VERSION,
  }
}

export function ackFrame(op: AckFrame["op"], accepted: string[], rejected?: string[]): AckFrame {
  return {
    type: "ack",
    op,
    ok: true,
    accepted,
    ...(rejected && { rejected }),
  }
}

export function pongFrame(ts?: number | null): PongFrame {
  return ts === undefined || ts === null ? { type: "pong" } : { type: "pong", ts }
}

export function errorFrame(code: RealtimeErrorCode, message: string, details?: Record<string, unknown>): ErrorFrame {
  return {
    type: "error",
    error: { code, message, ...(details && { details }) },
  }
}

// ============================================================================
// Stored events
// ============================================================================

const messageCreatedPayloadSchema = z.object({
  id: z.string(),
  sender_id: z.string(),
  client_message_id: z.string(),
  content: z.string(),
  created_at: z.string(),
})

const conversationUpdatedPayloadSchema = z.object({
  id: z.string(),
  updated_at: z.string(),
  last_message_preview: z.string().nullable(),
  last_message_at: z.string().nullable(),
})

const envelopeFields = {
  seq: z.number().int().positive(),
  occurred_at: z.string(),
}

const storedEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal(RealtimeEventTypes.MESSAGE_CREATED),
    ...envelopeFields,
    payload: messageCreatedPayloadSchema,
  }),
  z.object({
    type: z.literal(RealtimeEventTypes.CONVERSATION_UPDATED),
    ...envelopeFields,
    payload: conversationUpdatedPayloadSchema,
  }),
])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Rebuilds the wire frame for an outbox row. Throws on an unknown event type or
 * a malformed envelope; the Dispatcher records that as a failed attempt.
 */
export function decodeEventFrame(event: OutboxEvent): MessageCreatedFrame | ConversationUpdatedFrame {
  if (!isRecord(event.payload)) {
    throw new Error(`Outbox event ${event.eventId} has a non-object payload`)
  }
  if (!isRealtimeEventType(event.eventType)) {
    throw new Error(`Outbox event ${event.eventId} has unknown type "${event.eventType}"`)
  }

  const result = storedEventSchema.safeParse({ ...event.payload, type: event.eventType })
  if (!result.success) {
    throw new Error(`Outbox event ${event.eventId} is malformed: ${describeIssue(result.error)}`)
  }

  return {
    ...result.data,
    event_id: event.eventId,
    conversation_id: event.conversationId,
  }
}
