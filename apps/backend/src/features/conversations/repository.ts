import { sql, type Querier } from "../../db"

export interface Conversation {
  id: string
  type: string
  createdAt: Date
  updatedAt: Date
  lastMessagePreview: string | null
  lastMessageAt: Date | null
}

export interface TouchLastMessageParams {
  preview: string
  at: Date
}

interface ConversationRow {
  id: string
  type: string
  created_at: Date
  updated_at: Date
  last_message_preview: string | null
  last_message_at: Date | null
}

const SELECT_FIELDS = `id, type, created_at, updated_at, last_message_preview, last_message_at`

function mapRowToConversation(row: ConversationRow): Conversation {
  return {
    id: row.id,
    type: row.type,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastMessagePreview: row.last_message_preview,
    lastMessageAt: row.last_message_at,
  }
}

export const ConversationRepository = {
  async findById(db: Querier, id: string): Promise<Conversation | null> {
    const result = await db.query<ConversationRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM conversations WHERE id = ${id}
    `)
    return result.rows[0] ? mapRowToConversation(result.rows[0]) : null
  },

  /**
   * Records the newest message on the conversation. Runs in the sending
   * transaction, after the counter lock, so concurrent sends apply in seq order.
   */
  async touchLastMessage(client: Querier, id: string, params: TouchLastMessageParams): Promise<Conversation> {
    const result = await client.query<ConversationRow>(sql`
      UPDATE conversations
      SET last_message_preview = ${params.preview},
          last_message_at = ${params.at},
          updated_at = ${params.at}
      WHERE id = ${id}
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)
    const row = result.rows[0]
    if (!row) {
      throw new Error(`Conversation ${id} disappeared during send`)
    }
    return mapRowToConversation(row)
  },
}
