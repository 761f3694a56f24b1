import type { Request, Response, NextFunction } from "express"
import { z } from "zod"
import type { ApiErrorBody } from "@murmur/types"
import { HttpError } from "../lib/errors"
import { logger } from "../lib/logger"

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err)
    return
  }

  if (err instanceof HttpError) {
    const body: ApiErrorBody = {
      error: { code: err.code ?? "HTTP_ERROR", message: err.message, ...(err.details && { details: err.details }) },
    }
    res.status(err.status).json(body)
    return
  }

  if (err instanceof z.ZodError) {
    const body: ApiErrorBody = {
      error: {
        code: "VALIDATION_FAILED",
        message: "Validation failed",
        details: z.flattenError(err).fieldErrors,
      },
    }
    res.status(400).json(body)
    return
  }

  logger.error({ err, path: req.path, method: req.method }, "Unhandled error")

  const body: ApiErrorBody = { error: { code: "INTERNAL_ERROR", message: "Internal server error" } }
  res.status(500).json(body)
}
