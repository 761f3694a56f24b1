import { sql, type Querier } from "../../db"

export interface Message {
  id: string
  conversationId: string
  senderId: string
  clientMessageId: string
  seq: number
  content: string
  createdAt: Date
}

export interface InsertMessageParams {
  id: string
  conversationId: string
  senderId: string
  clientMessageId: string
  seq: number
  content: string
}

export interface ListAfterSeqParams {
  afterSeq: number
  limit: number
}

interface MessageRow {
  id: string
  conversation_id: string
  sender_id: string
  client_message_id: string
  seq: number
  content: string
  created_at: Date
}

export const CLIENT_MESSAGE_ID_CONSTRAINT = "messages_sender_client_message_id_key"
export const CONVERSATION_SEQ_CONSTRAINT = "messages_conversation_seq_key"

const SELECT_FIELDS = `id, conversation_id, sender_id, client_message_id, seq, content, created_at`

function mapRowToMessage(row: MessageRow): Message {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    senderId: row.sender_id,
    clientMessageId: row.client_message_id,
    seq: row.seq,
    content: row.content,
    createdAt: row.created_at,
  }
}

export const MessageRepository = {
  async findByClientMessageId(db: Querier, senderId: string, clientMessageId: string): Promise<Message | null> {
    const result = await db.query<MessageRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)}
      FROM messages
      WHERE sender_id = ${senderId} AND client_message_id = ${clientMessageId}
    `)
    return result.rows[0] ? mapRowToMessage(result.rows[0]) : null
  },

  async insert(client: Querier, params: InsertMessageParams): Promise<Message> {
    const result = await client.query<MessageRow>(sql`
      INSERT INTO messages (id, conversation_id, sender_id, client_message_id, seq, content)
      VALUES (
        ${params.id},
        ${params.conversationId},
        ${params.senderId},
        ${params.clientMessageId},
        ${params.seq},
        ${params.content}
      )
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)
    return mapRowToMessage(result.rows[0])
  },

  /**
   * History read used for gap recovery: everything after a known seq, in seq order.
   */
  async listAfterSeq(db: Querier, conversationId: string, params: ListAfterSeqParams): Promise<Message[]> {
    const result = await db.query<MessageRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)}
      FROM messages
      WHERE conversation_id = ${conversationId}
        AND seq > ${params.afterSeq}
      ORDER BY seq ASC
      LIMIT ${params.limit}
    `)
    return result.rows.map(mapRowToMessage)
  },
}
