import type { IncomingMessage, Server } from "http"
import { WebSocketServer, WebSocket, type RawData } from "ws"
import { CloseCodes, type CloseCode } from "@murmur/types"
import { extractBearerToken, type CredentialVerifier } from "./features/auth"
import type { MembershipChecker } from "./features/conversations"
import type { RealtimeConfig } from "./lib/env"
import { SlowConsumerError } from "./lib/errors"
import { connectionId as generateConnectionId } from "./lib/id"
import { logger } from "./lib/logger"
import { ProtocolSession, type ConnectionRegistry, type Transport } from "./lib/realtime"

export const REALTIME_PATH = "/v1/ws"

/**
 * The parts of a ws socket the transport needs.
 */
export interface SocketLike {
  readonly readyState: number
  readonly bufferedAmount: number
  send(data: string): void
  close(code: number, reason: string): void
}

interface Dependencies {
  registry: ConnectionRegistry
  verifier: CredentialVerifier
  membership: MembershipChecker
  config: RealtimeConfig
}

export interface RealtimeGateway {
  readonly wss: WebSocketServer
  close(): Promise<void>
}

/**
 * Credential from `Authorization: Bearer`, else the `access_token` query parameter.
 */
export function credentialFromRequest(req: Pick<IncomingMessage, "url" | "headers">): string | null {
  const fromHeader = extractBearerToken(req.headers.authorization)
  if (fromHeader) return fromHeader

  const url = new URL(req.url ?? "/", "http://localhost")
  return url.searchParams.get("access_token") || null
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  if (Buffer.isBuffer(data)) return data.toString("utf8")
  return Buffer.from(data).toString("utf8")
}

export function createSocketTransport(ws: SocketLike, connectionId: string, maxBufferedBytes: number): Transport {
  return {
    send(data: string) {
      if (ws.readyState !== WebSocket.OPEN) {
        throw new Error("Socket is not open")
      }
      if (ws.bufferedAmount > maxBufferedBytes) {
        throw new SlowConsumerError(connectionId, ws.bufferedAmount)
      }
      ws.send(data)
    },
    close(code: CloseCode, reason: string) {
      if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return
      ws.close(code, reason)
    },
  }
}

export function registerSocketHandlers(server: Server, deps: Dependencies): RealtimeGateway {
  const { registry, verifier, membership, config } = deps
  const wss = new WebSocketServer({ server, path: REALTIME_PATH })
  const sessions = new Set<ProtocolSession>()

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const id = generateConnectionId()
    const transport = createSocketTransport(ws, id, config.maxBufferedBytes)
    const current = new ProtocolSession(transport, { registry, verifier, membership, config, connectionId: id })
    sessions.add(current)

    logger.debug({ connectionId: current.connectionId }, "Socket connected")

    ws.on("message", (data: RawData) => {
      void current.handleMessage(rawDataToString(data))
    })

    ws.on("close", (code: number) => {
      current.handleTransportClose()
      sessions.delete(current)
      logger.debug({ connectionId: current.connectionId, userId: current.userId, code }, "Socket disconnected")
    })

    ws.on("error", (err: Error) => {
      logger.warn({ err, connectionId: current.connectionId }, "Socket error")
    })

    void current.authenticate(credentialFromRequest(req))
  })

  wss.on("error", (err: Error) => {
    logger.error({ err }, "WebSocket server error")
  })

  return {
    wss,
    async close() {
      for (const session of sessions) {
        session.close(CloseCodes.GOING_AWAY, "Server shutting down")
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()))
      })
    },
  }
}
