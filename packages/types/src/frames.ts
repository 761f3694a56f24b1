/**
 * Realtime wire frames.
 *
 * Each direction is a closed tagged union: inbound commands are tagged by `op`,
 * outbound frames by `type`. Field names are snake_case on the wire.
 */

import type { RealtimeErrorCode, RealtimeEventType } from "./constants"

// ============================================================================
// Client -> server
// ============================================================================

export interface SubscribeCommand {
  op: "subscribe"
  conversation_ids: string[]
}

export interface UnsubscribeCommand {
  op: "unsubscribe"
  conversation_ids: string[]
}

export interface PingCommand {
  op: "ping"
  ts?: number | null
}

export type ClientCommand = SubscribeCommand | UnsubscribeCommand | PingCommand

// ============================================================================
// Server -> client
// ============================================================================

export interface WelcomeFrame {
  type: "connection.welcome"
  connection_id: string
  user_id: string
  server_time: string
  heartbeat_sec: number
  protocol_version: number
}

export interface AckFrame {
  type: "ack"
  op: "subscribe" | "unsubscribe"
  ok: boolean
  accepted?: string[]
  rejected?: string[]
}

export interface PongFrame {
  type: "pong"
  ts?: number
}

export interface ErrorFrame {
  type: "error"
  error: {
    code: RealtimeErrorCode
    message: string
    details?: Record<string, unknown>
  }
}

export interface MessageCreatedPayload {
  id: string
  sender_id: string
  client_message_id: string
  content: string
  created_at: string
}

export interface ConversationUpdatedPayload {
  id: string
  updated_at: string
  last_message_preview: string | null
  last_message_at: string | null
}

export interface RealtimeEventPayloadMap {
  "message.created": MessageCreatedPayload
  "conversation.updated": ConversationUpdatedPayload
}

export interface EventFrame<T extends RealtimeEventType = RealtimeEventType> {
  type: T
  event_id: string
  conversation_id: string
  seq: number
  occurred_at: string
  payload: RealtimeEventPayloadMap[T]
}

export type MessageCreatedFrame = EventFrame<"message.created">
export type ConversationUpdatedFrame = EventFrame<"conversation.updated">

export type ServerFrame =
  | WelcomeFrame
  | AckFrame
  | PongFrame
  | ErrorFrame
  | MessageCreatedFrame
  | ConversationUpdatedFrame
