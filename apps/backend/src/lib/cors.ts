type CorsOriginCallback = (err: Error | null, origin?: boolean) => void
type CorsOriginChecker = (origin: string | undefined, callback: CorsOriginCallback) => void

/**
 * Origin checker for the `cors` middleware. An empty allowlist admits every
 * origin, which loadConfig only permits outside production.
 */
export function createCorsOriginChecker(allowedOrigins: string[]): CorsOriginChecker {
  const allowlist = new Set(allowedOrigins)

  return (origin, callback) => {
    // No Origin header: same-origin, native clients, curl, health checks.
    if (!origin || allowlist.size === 0) {
      callback(null, true)
      return
    }

    if (allowlist.has(origin)) {
      callback(null, true)
      return
    }

    callback(new Error("CORS origin not allowed"), false)
  }
}
