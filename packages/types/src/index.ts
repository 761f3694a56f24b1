// Constants and their types
export {
  PROTOCOL_VERSION,
  CLIENT_OPS,
  type ClientOp,
  ClientOps,
  REALTIME_EVENT_TYPES,
  type RealtimeEventType,
  RealtimeEventTypes,
  isRealtimeEventType,
  REALTIME_ERROR_CODES,
  type RealtimeErrorCode,
  RealtimeErrorCodes,
  CloseCodes,
  type CloseCode,
  CLIENT_MESSAGE_ID_MAX_LENGTH,
  MESSAGE_CONTENT_MAX_LENGTH,
  MESSAGE_PREVIEW_MAX_LENGTH,
} from "./constants"

// Realtime frames
export type {
  SubscribeCommand,
  UnsubscribeCommand,
  PingCommand,
  ClientCommand,
  WelcomeFrame,
  AckFrame,
  PongFrame,
  ErrorFrame,
  MessageCreatedPayload,
  ConversationUpdatedPayload,
  RealtimeEventPayloadMap,
  EventFrame,
  MessageCreatedFrame,
  ConversationUpdatedFrame,
  ServerFrame,
} from "./frames"

// API types
export type { Message, SendMessageResponse, ListMessagesResponse, ApiErrorBody } from "./api"
