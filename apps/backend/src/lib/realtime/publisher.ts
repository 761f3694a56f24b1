import { CloseCodes } from "@murmur/types"
import { SlowConsumerError } from "../errors"
import { logger } from "../logger"
import type { EventPublisher, OutboxEvent } from "../outbox"
import { decodeEventFrame } from "./protocol"
import type { ConnectionHandle, ConnectionRegistry } from "./registry"

export interface DeliveryOutcome {
  recipients: number
  delivered: number
  dropped: number
}

/**
 * Pushes outbox events to the sessions subscribed to their conversation.
 *
 * Storage is never touched here. A session whose write fails is closed, which
 * takes it out of the registry; the event still counts as delivered for everyone
 * else, and zero recipients is a success.
 */
export class Publisher implements EventPublisher {
  constructor(private readonly registry: ConnectionRegistry) {}

  async deliver(event: OutboxEvent): Promise<DeliveryOutcome> {
    const frame = decodeEventFrame(event)
    const data = JSON.stringify(frame)
    const handles = this.registry.fanout(event.conversationId)

    let delivered = 0
    let dropped = 0

    for (const handle of handles) {
      try {
        handle.send(data)
        delivered++
      } catch (err) {
        dropped++

        const slow = err instanceof SlowConsumerError
        logger.warn(
          { err, connectionId: handle.connectionId, eventId: event.eventId },
          slow ? "Dropping slow consumer" : "Dropping connection after failed write"
        )
        this.drop(handle, slow)
      }
    }

    return { recipients: handles.length, delivered, dropped }
  }

  // Closing the handle deregisters it; the registry is only touched here when close itself fails
  private drop(handle: ConnectionHandle, slow: boolean): void {
    try {
      handle.close(
        slow ? CloseCodes.TRY_AGAIN_LATER : CloseCodes.GOING_AWAY,
        slow ? "Slow consumer" : "Delivery failed"
      )
    } catch (err) {
      logger.warn({ err, connectionId: handle.connectionId }, "Close failed, deregistering directly")
      this.registry.deregister(handle.connectionId)
    }
  }
}
