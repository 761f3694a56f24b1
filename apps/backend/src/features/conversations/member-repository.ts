import { sql, type Querier } from "../../db"

export const ConversationMemberRepository = {
  async isMember(db: Querier, conversationId: string, userId: string): Promise<boolean> {
    const result = await db.query(sql`
      SELECT 1 FROM conversation_members
      WHERE conversation_id = ${conversationId} AND user_id = ${userId}
    `)
    return result.rows.length > 0
  },

  /**
   * The subset of `conversationIds` the user belongs to.
   */
  async filterMemberConversationIds(db: Querier, userId: string, conversationIds: string[]): Promise<string[]> {
    if (conversationIds.length === 0) return []

    const result = await db.query<{ conversation_id: string }>(sql`
      SELECT conversation_id FROM conversation_members
      WHERE user_id = ${userId}
        AND conversation_id = ANY(${conversationIds})
    `)
    return result.rows.map((row) => row.conversation_id)
  },
}
