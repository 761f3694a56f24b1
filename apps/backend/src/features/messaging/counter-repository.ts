import { sql, type Querier } from "../../db"

export const ConversationCounterRepository = {
  async ensure(client: Querier, conversationId: string): Promise<void> {
    await client.query(sql`
      INSERT INTO conversation_counters (conversation_id, next_seq)
      VALUES (${conversationId}, 1)
      ON CONFLICT (conversation_id) DO NOTHING
    `)
  },

  /**
   * Locks the counter row until the surrounding transaction ends and returns the
   * seq the next message will take. Concurrent senders to the same conversation
   * queue here; other conversations are unaffected.
   */
  async lockNextSeq(client: Querier, conversationId: string): Promise<number> {
    const result = await client.query<{ next_seq: number }>(sql`
      SELECT next_seq FROM conversation_counters
      WHERE conversation_id = ${conversationId}
      FOR UPDATE
    `)
    const row = result.rows[0]
    if (!row) {
      throw new Error(`Counter for conversation ${conversationId} is missing`)
    }
    return row.next_seq
  },

  async advance(client: Querier, conversationId: string, nextSeq: number): Promise<void> {
    await client.query(sql`
      UPDATE conversation_counters SET next_seq = ${nextSeq}
      WHERE conversation_id = ${conversationId}
    `)
  },
}
