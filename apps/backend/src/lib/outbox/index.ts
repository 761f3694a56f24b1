export { OutboxRepository, OUTBOX_CHANNEL } from "./repository"
export type { OutboxEvent, OutboxEnvelope, InsertOutboxEventParams, MarkFailedParams } from "./repository"
export { OutboxWriter, messagePreview } from "./writer"
export type { AppendEventParams } from "./writer"
export { OutboxDispatcher, truncateError } from "./dispatcher"
export type { EventPublisher, ListenClient, ListenSource, OutboxDispatcherConfig } from "./dispatcher"
