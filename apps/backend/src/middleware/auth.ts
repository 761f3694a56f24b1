import type { Request, Response, NextFunction } from "express"
import { extractBearerToken, type CredentialVerifier } from "../features/auth"
import { UnauthorizedError } from "../lib/errors"

declare global {
  namespace Express {
    interface Request {
      userId?: string
    }
  }
}

interface Dependencies {
  verifier: CredentialVerifier
}

export function createAuthMiddleware({ verifier }: Dependencies) {
  return async function authMiddleware(req: Request, _res: Response, next: NextFunction) {
    const token = extractBearerToken(req.headers.authorization)
    if (!token) {
      throw new UnauthorizedError("Not authenticated")
    }

    // Rejections reach errorHandler as 401 UNAUTHORIZED or TOKEN_EXPIRED
    req.userId = await verifier.verify(token)
    next()
  }
}
