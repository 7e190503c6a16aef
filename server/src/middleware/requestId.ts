/**
 * Request ID middleware: read x-request-id from the edge or generate a UUID.
 * Attaches it to the request and echoes it in the response header for correlation (UI → API → poller logs).
 */
import type { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'

export const REQUEST_ID_HEADER = 'x-request-id'

export interface RequestWithId extends Request {
  requestId?: string
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim().slice(0, 128) : uuidv4()
  ;(req as RequestWithId).requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

export function getRequestId(req: Request): string | undefined {
  return (req as RequestWithId).requestId
}
