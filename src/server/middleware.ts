/**
 * HTTP middleware: async route wrapper and the error-to-status mapping.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express'
import {
  CommitFailureError,
  NotFoundError,
  PipewrightError,
  ValidationFailureError,
  WorkflowAbortedError,
} from '../core/errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('server')

export interface ApiErrorBody {
  error: {
    code: string
    message: string
    issues?: string[]
  }
}

export function apiError(code: string, message: string, issues?: string[]): ApiErrorBody {
  return { error: { code, message, ...(issues !== undefined && { issues }) } }
}

/** Forward a rejected handler promise to the error handler */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next)
  }
}

function statusFor(err: PipewrightError): number {
  if (err instanceof ValidationFailureError) return 400
  if (err instanceof NotFoundError) return 404
  if (err instanceof CommitFailureError) return 502
  if (err instanceof WorkflowAbortedError) return 503
  return 500
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'
}

/** Final error handler; must keep its four-argument signature */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(err)) {
    res.status(400).json(apiError('INVALID_JSON', 'Request body is not valid JSON'))
    return
  }
  if (err instanceof PipewrightError) {
    const status = statusFor(err)
    if (status >= 500) logger.error({ path: req.path, code: err.code, err: err.message }, 'Request failed')
    const issues = err instanceof ValidationFailureError ? err.issues : undefined
    res.status(status).json(apiError(err.code, err.message, issues))
    return
  }
  logger.error({ path: req.path, err }, 'Unhandled request error')
  res.status(500).json(apiError('INTERNAL', 'Internal server error'))
}
