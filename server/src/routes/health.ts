/**
 * Health, version, config presence and job counters.
 * None of these probe the video provider.
 */
import { Router, Request, Response } from 'express'
import type { AppConfig } from '../config'
import type { VideoJobController } from '../services/jobController'

export const SERVICE_NAME = 'sora-video-gateway'

const release = process.env.RELEASE || 'dev'
const BUILD_TIME = process.env.BUILD_TIME || undefined

export function createHealthRouter(controller: VideoJobController, config: AppConfig) {
  const router = Router()

  /** GET /api/health: process responsive */
  router.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ...controller.healthcheck(), service: SERVICE_NAME })
  })

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /version: service, release, buildTime, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      release,
      buildTime: BUILD_TIME,
      env: config.server.env,
    })
  })

  /** GET /configz: redacted config (presence and limits, no secrets). */
  router.get('/configz', (_req: Request, res: Response) => {
    res.json({
      hasProviderKey: Boolean(config.provider.apiKey),
      hasProviderEndpoint: Boolean(config.provider.endpoint),
      providerApiVersion: config.provider.apiVersion,
      hasSentryDsn: Boolean(process.env.SENTRY_DSN),
      mode: config.server.env,
      limits: {
        maxConcurrentJobs: config.jobs.maxConcurrentJobs,
        maxStoredJobs: config.jobs.maxStoredJobs,
        pollIntervalMs: config.jobs.pollIntervalMs,
        resolutions: config.video.resolutions,
        minDuration: config.video.minDuration,
        maxDuration: config.video.maxDuration,
      },
    })
  })

  /** GET /ops/jobs: stored jobs by status and active polling tasks. */
  router.get('/ops/jobs', (_req: Request, res: Response) => {
    res.json(controller.stats())
  })

  return router
}
