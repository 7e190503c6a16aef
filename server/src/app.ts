import express, { NextFunction, Request, Response } from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import type { AppConfig } from './config'
import { withRequestId } from './lib/logger'
import { sentryRequestIdScope, setupSentryErrorHandler } from './lib/sentry'
import { getRequestId, requestIdMiddleware } from './middleware/requestId'
import { createHealthRouter } from './routes/health'
import { createVideoRouter } from './routes/video'
import type { VideoJobController } from './services/jobController'

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '') // trim and strip trailing slash
}

/** Explicit allowlist from CORS_ORIGINS; outside production any origin is allowed. */
function createCorsOptions(config: AppConfig): cors.CorsOptions {
  const allowed = new Set(config.server.corsOrigins.map(normalizeOrigin))
  const isProduction = config.server.env === 'production'
  return {
    origin: (origin, callback) => {
      if (!origin || !isProduction || allowed.has(normalizeOrigin(origin))) {
        callback(null, true)
      } else {
        callback(null, false)
      }
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    optionsSuccessStatus: 204,
  }
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err
}

export function createApp(options: { controller: VideoJobController; config: AppConfig }) {
  const { controller, config } = options
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')

  // Trust one proxy hop so rate-limit reads the client address from X-Forwarded-For
  app.set('trust proxy', 1)

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: config.server.rateLimitPerMinute,
    message: { message: 'Too many requests. Please wait.' },
    standardHeaders: true,
    legacyHeaders: false,
  })

  app.use(cors(createCorsOptions(config)))
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(express.json({ limit: '100kb' }))
  app.use(express.urlencoded({ extended: false, limit: '100kb' }))

  app.use('/api', apiLimiter)
  app.use('/api/video', createVideoRouter(controller))
  app.use(createHealthRouter(controller, config))

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Not found' })
  })

  setupSentryErrorHandler(app)

  // Final error handler: malformed bodies are client errors, everything else a 500.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ message: 'Request body is not valid JSON' })
      return
    }
    withRequestId(getRequestId(req)).error({ msg: 'Unhandled error', err })
    res.status(500).json({ message: 'Internal server error' })
  })

  return app
}
