/**
 * Structured JSON logger for the API and the job poller. Single format: level, timestamp, service, env, release, requestId/jobId.
 * Redacts provider credentials and auth headers. LOG_LEVEL=silent in tests.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'info'

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'apiKey',
  'api_key',
  '*.apiKey',
  'authorization',
  'cookie',
  'req.headers.authorization',
  'req.headers["api-key"]',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  'AZURE_OPENAI_API_KEY',
  'SENTRY_DSN',
]

export type ServiceName = 'api' | 'poller'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger with requestId (API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger with jobId and the provider's job id (poller context). */
export function withJobContext(jobId: string, providerJobId?: string): pino.Logger {
  return getLogger('poller').child({ jobId, providerJobId: providerJobId || undefined })
}

/** Keep the start of a prompt only; full prompts stay out of logs. */
export function redactPrompt(prompt: string, max = 40): string {
  if (prompt.length <= max) return prompt
  return `${prompt.slice(0, max)}…`
}
