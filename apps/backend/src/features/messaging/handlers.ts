import { z } from "zod"
import type { Request, Response } from "express"
import {
  CLIENT_MESSAGE_ID_MAX_LENGTH,
  MESSAGE_CONTENT_MAX_LENGTH,
  type ApiErrorBody,
  type ListMessagesResponse,
  type Message as WireMessage,
  type SendMessageResponse,
} from "@murmur/types"
import { ConversationNotFoundError, UnauthorizedError } from "../../lib/errors"
import type { Message } from "./repository"
import type { MessageService } from "./service"

const sendMessageSchema = z.object({
  client_message_id: z
    .string()
    .min(1, "client_message_id is required")
    .max(CLIENT_MESSAGE_ID_MAX_LENGTH, `client_message_id must be at most ${CLIENT_MESSAGE_ID_MAX_LENGTH} characters`),
  content: z
    .string()
    .min(1, "content is required")
    .max(MESSAGE_CONTENT_MAX_LENGTH, `content must be at most ${MESSAGE_CONTENT_MAX_LENGTH} characters`),
})

const listMessagesQuerySchema = z.object({
  after_seq: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(50),
})

function serializeMessage(message: Message): WireMessage {
  return {
    id: message.id,
    conversation_id: message.conversationId,
    sender_id: message.senderId,
    client_message_id: message.clientMessageId,
    seq: message.seq,
    content: message.content,
    created_at: message.createdAt.toISOString(),
  }
}

function validationFailed(res: Response, error: z.ZodError): void {
  const body: ApiErrorBody = {
    error: {
      code: "VALIDATION_FAILED",
      message: "Validation failed",
      details: z.flattenError(error).fieldErrors,
    },
  }
  res.status(400).json(body)
}

function requireUserId(req: Request): string {
  if (!req.userId) {
    throw new UnauthorizedError("Not authenticated")
  }
  return req.userId
}

// Route params may carry arrays for wildcard segments; this route only has a plain one
export function conversationIdParam(req: Pick<Request, "params">): string {
  const { conversationId } = req.params
  if (typeof conversationId !== "string" || conversationId.length === 0) {
    throw new ConversationNotFoundError()
  }
  return conversationId
}

interface Dependencies {
  messageService: MessageService
}

export function createMessageHandlers({ messageService }: Dependencies) {
  return {
    async send(req: Request, res: Response) {
      const userId = requireUserId(req)
      const conversationId = conversationIdParam(req)

      const result = sendMessageSchema.safeParse(req.body)
      if (!result.success) {
        return validationFailed(res, result.error)
      }

      const { message, isNew } = await messageService.sendMessage({
        conversationId,
        senderId: userId,
        clientMessageId: result.data.client_message_id,
        content: result.data.content,
      })

      const body: SendMessageResponse = { data: serializeMessage(message) }
      res.status(isNew ? 201 : 200).json(body)
    },

    async list(req: Request, res: Response) {
      const userId = requireUserId(req)
      const conversationId = conversationIdParam(req)

      const result = listMessagesQuerySchema.safeParse(req.query)
      if (!result.success) {
        return validationFailed(res, result.error)
      }

      const messages = await messageService.listMessages({
        conversationId,
        userId,
        afterSeq: result.data.after_seq,
        limit: result.data.limit,
      })

      const body: ListMessagesResponse = { data: { messages: messages.map(serializeMessage) } }
      res.json(body)
    },
  }
}
