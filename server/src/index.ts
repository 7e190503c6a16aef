import './env'
import { initSentry, flushSentry } from './lib/sentry'

initSentry()
import { createApp } from './app'
import { loadConfig, type AppConfig } from './config'
import { ConfigError } from './lib/errors'
import { getLogger } from './lib/logger'
import { AzureSoraProvider } from './services/azureSora'
import { VideoJobController } from './services/jobController'

const log = getLogger('api')

let config: AppConfig
try {
  config = loadConfig()
} catch (err) {
  if (err instanceof ConfigError) {
    log.fatal({ msg: 'Invalid configuration', error: err.message })
    process.exit(1)
  }
  throw err
}

const controller = new VideoJobController({
  provider: new AzureSoraProvider(config.provider),
  video: config.video,
  jobs: config.jobs,
})
controller.start()

const app = createApp({ controller, config })

const server = app.listen(config.server.port, config.server.host, () => {
  log.info({
    msg: 'Server listening',
    host: config.server.host,
    port: config.server.port,
    deployment: config.provider.deployment,
    maxConcurrentJobs: config.jobs.maxConcurrentJobs,
    maxStoredJobs: config.jobs.maxStoredJobs,
  })
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ msg: `Port ${config.server.port} is already in use. Change PORT in your .env file.` })
  } else {
    log.fatal({ msg: 'Server error', err: error })
  }
  process.exit(1)
})

let shuttingDown = false

// In-flight jobs are abandoned; their records stay in the last known state until the process exits.
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  log.info({ msg: `${signal} received, shutting down gracefully`, active: controller.activeJobs })
  await controller.shutdown()
  await flushSentry()
  server.close(() => {
    log.info({ msg: 'Server closed' })
    process.exit(0)
  })
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ msg: 'Shutdown failed', err })
      process.exit(1)
    })
  })
}
