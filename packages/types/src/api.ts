/**
 * REST request/response types for the message write path and history reads.
 */

export interface Message {
  id: string
  conversation_id: string
  sender_id: string
  client_message_id: string
  seq: number
  content: string
  created_at: string
}

export interface SendMessageResponse {
  data: Message
}

export interface ListMessagesResponse {
  data: { messages: Message[] }
}

export interface ApiErrorBody {
  error: {
    code: string
    message: string
    details?: unknown
  }
}
