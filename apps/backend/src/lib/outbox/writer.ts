import {
  MESSAGE_PREVIEW_MAX_LENGTH,
  RealtimeEventTypes,
  type ConversationUpdatedPayload,
  type MessageCreatedPayload,
  type RealtimeEventPayloadMap,
  type RealtimeEventType,
} from "@murmur/types"
import type { Querier } from "../../db"
import type { Message } from "../../features/messaging"
import type { Conversation } from "../../features/conversations"
import { eventId } from "../id"
import { OutboxRepository } from "./repository"

export interface AppendEventParams<T extends RealtimeEventType> {
  conversationId: string
  eventType: T
  seq: number
  occurredAt: Date
  payload: RealtimeEventPayloadMap[T]
}

export function messagePreview(content: string): string {
  return content.slice(0, MESSAGE_PREVIEW_MAX_LENGTH)
}

/**
 * Records realtime events inside the transaction of the change they describe.
 * Delivery happens later, from the Dispatcher; nothing here waits on sockets.
 */
export const OutboxWriter = {
  async append<T extends RealtimeEventType>(client: Querier, params: AppendEventParams<T>): Promise<string> {
    const id = eventId()
    await OutboxRepository.insert(client, {
      eventId: id,
      eventType: params.eventType,
      conversationId: params.conversationId,
      envelope: {
        seq: params.seq,
        occurred_at: params.occurredAt.toISOString(),
        payload: params.payload,
      },
    })
    return id
  },

  appendMessageCreated(client: Querier, message: Message): Promise<string> {
    const payload: MessageCreatedPayload = {
      id: message.id,
      sender_id: message.senderId,
      client_message_id: message.clientMessageId,
      content: message.content,
      created_at: message.createdAt.toISOString(),
    }
    return OutboxWriter.append(client, {
      conversationId: message.conversationId,
      eventType: RealtimeEventTypes.MESSAGE_CREATED,
      seq: message.seq,
      occurredAt: message.createdAt,
      payload,
    })
  },

  appendConversationUpdated(client: Querier, conversation: Conversation, seq: number): Promise<string> {
    const payload: ConversationUpdatedPayload = {
      id: conversation.id,
      updated_at: conversation.updatedAt.toISOString(),
      last_message_preview: conversation.lastMessagePreview,
      last_message_at: conversation.lastMessageAt ? conversation.lastMessageAt.toISOString() : null,
    }
    return OutboxWriter.append(client, {
      conversationId: conversation.id,
      eventType: RealtimeEventTypes.CONVERSATION_UPDATED,
      seq,
      occurredAt: conversation.updatedAt,
      payload,
    })
  },
}
