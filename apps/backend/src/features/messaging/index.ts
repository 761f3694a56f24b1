// Repositories
export { MessageRepository, CLIENT_MESSAGE_ID_CONSTRAINT, CONVERSATION_SEQ_CONSTRAINT } from "./repository"
export type { Message, InsertMessageParams, ListAfterSeqParams } from "./repository"
export { ConversationCounterRepository } from "./counter-repository"

// Sequencer
export { Sequencer } from "./sequencer"
export type { AllocateAndInsertParams, AllocateAndInsertResult } from "./sequencer"

// Service
export { MessageService } from "./service"
export type { SendMessageParams, SendMessageResult, ListMessagesParams } from "./service"

// Handlers
export { createMessageHandlers } from "./handlers"
