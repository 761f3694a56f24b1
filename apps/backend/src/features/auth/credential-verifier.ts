import jwt from "jsonwebtoken"
import { z } from "zod"
import { TokenExpiredError, UnauthorizedError } from "../../lib/errors"

/**
 * Resolves a bearer credential to a user id. Fails with UnauthorizedError or
 * TokenExpiredError; issuance and rotation live elsewhere.
 */
export interface CredentialVerifier {
  verify(token: string): Promise<string>
}

const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.literal("access"),
})

export class JwtCredentialVerifier implements CredentialVerifier {
  constructor(private readonly secret: string) {}

  async verify(token: string): Promise<string> {
    let decoded: string | jwt.JwtPayload
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ["HS256"] })
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError(err)
      }
      throw new UnauthorizedError("Invalid token", err instanceof Error ? err : undefined)
    }

    const claims = accessClaimsSchema.safeParse(decoded)
    if (!claims.success) {
      throw new UnauthorizedError("Invalid token claims")
    }
    return claims.data.sub
  }
}

/**
 * Bearer token from an Authorization header value, or null.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null
  const [scheme, token] = header.split(" ")
  if (scheme?.toLowerCase() !== "bearer" || !token) return null
  return token.trim() || null
}
