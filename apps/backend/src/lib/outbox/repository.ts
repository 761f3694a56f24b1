import { sql, type Querier } from "../../db"
import type { RealtimeEventType } from "@murmur/types"

/**
 * Stored alongside each outbox row. The Publisher rebuilds the wire frame from
 * this plus the row's own event_id, event_type and conversation_id.
 */
export interface OutboxEnvelope<P = unknown> {
  seq: number
  occurred_at: string
  payload: P
}

export interface OutboxEvent {
  id: bigint
  eventId: string
  /** Validated by the Publisher, not here: rows written by older code may carry anything. */
  eventType: string
  conversationId: string
  payload: unknown
  createdAt: Date
  publishedAt: Date | null
  attempts: number
  nextAttemptAt: Date
  lastError: string | null
}

export interface InsertOutboxEventParams {
  eventId: string
  eventType: RealtimeEventType
  conversationId: string
  envelope: OutboxEnvelope
}

export interface MarkFailedParams {
  attempts: number
  delayMs: number
  lastError: string
}

interface OutboxRow {
  id: string
  event_id: string
  event_type: string
  conversation_id: string
  payload: unknown
  created_at: Date
  published_at: Date | null
  attempts: number
  next_attempt_at: Date
  last_error: string | null
}

const SELECT_FIELDS = `
  id, event_id, event_type, conversation_id, payload, created_at,
  published_at, attempts, next_attempt_at, last_error
`

function mapRowToOutbox(row: OutboxRow): OutboxEvent {
  return {
    id: BigInt(row.id),
    eventId: row.event_id,
    eventType: row.event_type,
    conversationId: row.conversation_id,
    payload: row.payload,
    createdAt: row.created_at,
    publishedAt: row.published_at,
    attempts: row.attempts,
    nextAttemptAt: row.next_attempt_at,
    lastError: row.last_error,
  }
}

export const OUTBOX_CHANNEL = "realtime_outbox"

export const OutboxRepository = {
  /**
   * Appends a pending row. Must run on the client of the transaction that made
   * the change; the NOTIFY is only delivered when that transaction commits.
   */
  async insert(client: Querier, params: InsertOutboxEventParams): Promise<OutboxEvent> {
    const result = await client.query<OutboxRow>(sql`
      INSERT INTO realtime_outbox_events (event_id, event_type, conversation_id, payload)
      VALUES (${params.eventId}, ${params.eventType}, ${params.conversationId}, ${JSON.stringify(params.envelope)})
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)

    await client.query(`NOTIFY ${OUTBOX_CHANNEL}`)

    return mapRowToOutbox(result.rows[0])
  },

  /**
   * Pending rows whose next attempt is due, oldest first.
   */
  async fetchDue(db: Querier, limit: number): Promise<OutboxEvent[]> {
    const result = await db.query<OutboxRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)}
      FROM realtime_outbox_events
      WHERE published_at IS NULL
        AND next_attempt_at <= NOW()
      ORDER BY id
      LIMIT ${limit}
    `)
    return result.rows.map(mapRowToOutbox)
  },

  async markPublished(db: Querier, id: bigint): Promise<void> {
    await db.query(sql`
      UPDATE realtime_outbox_events
      SET published_at = NOW(), last_error = NULL
      WHERE id = ${id.toString()}
    `)
  },

  async markFailed(db: Querier, id: bigint, params: MarkFailedParams): Promise<void> {
    await db.query(sql`
      UPDATE realtime_outbox_events
      SET attempts = ${params.attempts},
          next_attempt_at = NOW() + (${params.delayMs}::double precision * INTERVAL '1 millisecond'),
          last_error = ${params.lastError}
      WHERE id = ${id.toString()}
    `)
  },
}
