import type { Pool } from "pg"
import { withTransaction, type Querier } from "../../db"
import {
  ClientMessageConflictError,
  ConversationNotFoundError,
  ForbiddenConversationError,
  isUniqueViolation,
} from "../../lib/errors"
import { logger } from "../../lib/logger"
import { OutboxWriter, messagePreview } from "../../lib/outbox"
import { ConversationRepository, type MembershipChecker } from "../conversations"
import { CLIENT_MESSAGE_ID_CONSTRAINT, MessageRepository, type Message } from "./repository"
import { Sequencer } from "./sequencer"

export interface SendMessageParams {
  conversationId: string
  senderId: string
  clientMessageId: string
  content: string
}

export interface SendMessageResult {
  message: Message
  isNew: boolean
}

export interface ListMessagesParams {
  conversationId: string
  userId: string
  afterSeq: number
  limit: number
}

export class MessageService {
  constructor(
    private pool: Pool,
    private membership: MembershipChecker
  ) {}

  /**
   * Stores a message and its realtime events in one transaction. Repeating a
   * (sender, client_message_id) pair returns the original message and writes
   * no new events.
   */
  async sendMessage(params: SendMessageParams): Promise<SendMessageResult> {
    try {
      return await withTransaction(this.pool, async (client) => {
        await this.assertMember(client, params.conversationId, params.senderId)

        const { message, isNew } = await Sequencer.allocateAndInsert(client, params)
        if (!isNew) {
          return { message, isNew }
        }

        const conversation = await ConversationRepository.touchLastMessage(client, params.conversationId, {
          preview: messagePreview(message.content),
          at: message.createdAt,
        })

        await OutboxWriter.appendMessageCreated(client, message)
        await OutboxWriter.appendConversationUpdated(client, conversation, message.seq)

        return { message, isNew: true }
      })
    } catch (error) {
      // A racing send with the same key in another conversation committed first
      if (isUniqueViolation(error, CLIENT_MESSAGE_ID_CONSTRAINT)) {
        return this.resolveRacedSend(params)
      }
      throw error
    }
  }

  async listMessages(params: ListMessagesParams): Promise<Message[]> {
    await this.assertMember(this.pool, params.conversationId, params.userId)
    return MessageRepository.listAfterSeq(this.pool, params.conversationId, {
      afterSeq: params.afterSeq,
      limit: params.limit,
    })
  }

  private async resolveRacedSend(params: SendMessageParams): Promise<SendMessageResult> {
    const winner = await MessageRepository.findByClientMessageId(this.pool, params.senderId, params.clientMessageId)
    if (!winner) {
      throw new Error(`Unique violation on client_message_id "${params.clientMessageId}" but no message found`)
    }
    if (winner.conversationId !== params.conversationId) {
      throw new ClientMessageConflictError(params.clientMessageId)
    }

    logger.debug({ messageId: winner.id, conversationId: winner.conversationId }, "Resolved raced send as replay")
    return { message: winner, isNew: false }
  }

  private async assertMember(db: Querier, conversationId: string, userId: string): Promise<void> {
    const conversation = await ConversationRepository.findById(db, conversationId)
    if (!conversation) {
      throw new ConversationNotFoundError()
    }
    const isMember = await this.membership.isMember(conversationId, userId)
    if (!isMember) {
      throw new ForbiddenConversationError()
    }
  }
}
