import express, { Request, Response } from 'express'
import {
  CapacityError,
  JobNotReadyError,
  NotFoundError,
  ProviderError,
  ValidationError,
  errorMessage,
  type ProviderErrorKind,
} from '../lib/errors'
import { withRequestId } from '../lib/logger'
import { captureApiError } from '../lib/sentry'
import { getRequestId } from '../middleware/requestId'
import type { VideoJobController } from '../services/jobController'
import { readVideoRequestInput } from '../utils/videoRequest'

const NO_STORE_HEADERS = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  'Pragma': 'no-cache',
  'Expires': '0',
  'Surrogate-Control': 'no-store',
}

const PROVIDER_ERROR_STATUS: Record<ProviderErrorKind, number> = {
  auth: 502,
  invalid_request: 400,
  rate_limit: 429,
  transient: 503,
  unknown: 502,
}

/** Map controller errors onto HTTP responses. Anything unrecognised is a 500 and goes to Sentry. */
function sendError(req: Request, res: Response, err: unknown, fallbackMessage: string) {
  const log = withRequestId(getRequestId(req))
  if (err instanceof ValidationError) {
    log.info({ msg: 'Rejected invalid video request', issues: err.issues })
    return res.status(422).json({ message: err.message, errors: err.issues })
  }
  if (err instanceof CapacityError) {
    res.set('Retry-After', '30')
    return res.status(429).json({ message: err.message })
  }
  if (err instanceof NotFoundError) {
    return res.status(404).json({ message: 'Video job not found' })
  }
  if (err instanceof JobNotReadyError) {
    return res.status(409).json({ message: 'Video is not ready yet', status: err.status })
  }
  if (err instanceof ProviderError) {
    return res.status(PROVIDER_ERROR_STATUS[err.kind]).json({ message: err.message, kind: err.kind })
  }
  log.error({ msg: fallbackMessage, err })
  captureApiError(getRequestId(req), err)
  return res.status(500).json({ message: errorMessage(err) || fallbackMessage })
}

export function createVideoRouter(controller: VideoJobController) {
  const router = express.Router()

  /** POST /generate: start a job; answers as soon as the provider has accepted it. */
  router.post('/generate', async (req: Request, res: Response) => {
    try {
      const result = await controller.submitJob(readVideoRequestInput(req.body))
      res.json({ video_id: result.id, ...result })
    } catch (error) {
      sendError(req, res, error, 'Failed to start video generation')
    }
  })

  router.get('/status/:jobId', (req: Request, res: Response) => {
    res.set(NO_STORE_HEADERS)
    try {
      const view = controller.getJobStatus(req.params.jobId)
      res.json({ video_id: view.id, ...view })
    } catch (error) {
      sendError(req, res, error, 'Failed to get video status')
    }
  })

  /** GET /:jobId/content: proxy the finished video; provider URLs need our credentials. */
  router.get('/:jobId/content', async (req: Request, res: Response) => {
    try {
      const { body, contentType, contentLength } = await controller.getVideoContent(req.params.jobId)
      res.set({
        'Content-Type': contentType,
        'Content-Disposition': `attachment; filename="${req.params.jobId}.mp4"`,
      })
      if (contentLength !== undefined) res.set('Content-Length', String(contentLength))

      // Headers are already out once bytes flow, so a broken upstream can only cut the response.
      body.on('error', (err) => {
        withRequestId(getRequestId(req)).warn({ msg: 'Video stream failed', jobId: req.params.jobId, err })
        res.destroy(err)
      })
      res.on('close', () => body.destroy())
      body.pipe(res)
    } catch (error) {
      sendError(req, res, error, 'Failed to download video')
    }
  })

  router.post('/cleanup', (req: Request, res: Response) => {
    try {
      const { removed } = controller.cleanup()
      res.json({ removed, message: `Old jobs cleaned up successfully (${removed} removed)` })
    } catch (error) {
      sendError(req, res, error, 'Cleanup failed')
    }
  })

  return router
}
