import type { Querier } from "../../db"
import { ClientMessageConflictError, ConflictError, isUniqueViolation } from "../../lib/errors"
import { messageId } from "../../lib/id"
import { ConversationCounterRepository } from "./counter-repository"
import { CONVERSATION_SEQ_CONSTRAINT, MessageRepository, type Message } from "./repository"

export interface AllocateAndInsertParams {
  conversationId: string
  senderId: string
  clientMessageId: string
  content: string
}

export interface AllocateAndInsertResult {
  message: Message
  isNew: boolean
}

/**
 * Assigns per-conversation sequence numbers. Must be called with the client of
 * an open transaction: the counter row stays locked until that transaction ends,
 * which is what makes seq assignment and the insert atomic.
 */
export const Sequencer = {
  async allocateAndInsert(client: Querier, params: AllocateAndInsertParams): Promise<AllocateAndInsertResult> {
    const { conversationId, senderId, clientMessageId, content } = params

    await ConversationCounterRepository.ensure(client, conversationId)
    const nextSeq = await ConversationCounterRepository.lockNextSeq(client, conversationId)

    // Checked under the lock so a concurrent repeat in this conversation sees the winner.
    const existing = await MessageRepository.findByClientMessageId(client, senderId, clientMessageId)
    if (existing) {
      if (existing.conversationId !== conversationId) {
        throw new ClientMessageConflictError(clientMessageId)
      }
      return { message: existing, isNew: false }
    }

    let message: Message
    try {
      message = await MessageRepository.insert(client, {
        id: messageId(),
        conversationId,
        senderId,
        clientMessageId,
        seq: nextSeq,
        content,
      })
    } catch (error) {
      if (isUniqueViolation(error, CONVERSATION_SEQ_CONSTRAINT)) {
        throw new ConflictError(conversationId, error instanceof Error ? error : undefined)
      }
      throw error
    }

    await ConversationCounterRepository.advance(client, conversationId, nextSeq + 1)

    return { message, isNew: true }
  },
}
