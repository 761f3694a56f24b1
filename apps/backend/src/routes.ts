import type { Express, RequestHandler } from "express"
import { createAuthMiddleware } from "./middleware/auth"
import { createRateLimiters } from "./middleware/rate-limit"
import { createMessageHandlers, type MessageService } from "./features/messaging"
import type { CredentialVerifier } from "./features/auth"
import { errorHandler } from "./middleware/error-handler"

interface Dependencies {
  verifier: CredentialVerifier
  messageService: MessageService
}

export function registerRoutes(app: Express, deps: Dependencies) {
  const { verifier, messageService } = deps

  const rateLimits = createRateLimiters()
  const auth = createAuthMiddleware({ verifier })
  // Express natively chains handlers - spread array at usage sites
  const authed: RequestHandler[] = [auth]

  const message = createMessageHandlers({ messageService })

  app.use("/v1", rateLimits.globalBaseline)

  app.post("/v1/conversations/:conversationId/messages", ...authed, rateLimits.messageCreate, message.send)
  app.get("/v1/conversations/:conversationId/messages", ...authed, message.list)

  app.use(errorHandler)
}
