/**
 * Process-wide configuration, read once at startup from the environment.
 * Missing provider credentials or malformed limits throw ConfigError (fatal).
 */
import { ConfigError } from './lib/errors'

export interface ProviderConfig {
  apiKey: string
  endpoint: string
  apiVersion: string
  deployment: string
  timeoutMs: number
}

export interface VideoLimits {
  promptMaxLength: number
  resolutions: readonly string[]
  defaultResolution: string
  minDuration: number
  maxDuration: number
  defaultDuration: number
}

export interface JobLimits {
  maxConcurrentJobs: number
  maxStoredJobs: number
  pollIntervalMs: number
  maxConsecutiveFailures: number
  cleanupIntervalMs: number
  maxJobAgeMs: number
}

export interface ServerConfig {
  host: string
  port: number
  env: string
  corsOrigins: readonly string[]
  rateLimitPerMinute: number
}

export interface AppConfig {
  provider: ProviderConfig
  video: VideoLimits
  jobs: JobLimits
  server: ServerConfig
}

export const DEFAULT_RESOLUTIONS = ['1920x1080', '1080x1920', '1280x720', '720x1280', '1024x1024']

type Env = Record<string, string | undefined>

function readString(env: Env, key: string, fallback?: string): string {
  const raw = env[key]?.trim()
  if (raw) return raw
  if (fallback !== undefined) return fallback
  throw new ConfigError(`${key} is required`)
}

function readInt(env: Env, key: string, fallback: number, min = 1): number {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be an integer (got "${raw}")`)
  }
  const value = parseInt(raw, 10)
  if (value < min) {
    throw new ConfigError(`${key} must be >= ${min} (got ${value})`)
  }
  return value
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key]
  if (!raw || !raw.trim()) return fallback
  return raw.split(',').map((s) => s.trim()).filter(Boolean)
}

function loadVideoLimits(env: Env): VideoLimits {
  const resolutions = readList(env, 'VIDEO_RESOLUTIONS', DEFAULT_RESOLUTIONS).map((r) => r.toLowerCase())
  for (const r of resolutions) {
    if (!/^\d+x\d+$/.test(r)) {
      throw new ConfigError(`VIDEO_RESOLUTIONS entry "${r}" must look like WIDTHxHEIGHT`)
    }
  }
  const defaultResolution = readString(env, 'DEFAULT_RESOLUTION', resolutions[0]).toLowerCase()
  if (!resolutions.includes(defaultResolution)) {
    throw new ConfigError(`DEFAULT_RESOLUTION ${defaultResolution} is not one of VIDEO_RESOLUTIONS`)
  }

  // Deployments disagree on the upper bound (15 vs 60 seconds), so both ends are configurable.
  const minDuration = readInt(env, 'VIDEO_MIN_DURATION', 1)
  const maxDuration = readInt(env, 'VIDEO_MAX_DURATION', 15)
  if (minDuration > maxDuration) {
    throw new ConfigError(`VIDEO_MIN_DURATION (${minDuration}) must not exceed VIDEO_MAX_DURATION (${maxDuration})`)
  }
  const defaultDuration = readInt(env, 'DEFAULT_DURATION', Math.min(Math.max(5, minDuration), maxDuration))
  if (defaultDuration < minDuration || defaultDuration > maxDuration) {
    throw new ConfigError(`DEFAULT_DURATION (${defaultDuration}) must be within ${minDuration}-${maxDuration}`)
  }

  return {
    promptMaxLength: readInt(env, 'PROMPT_MAX_LENGTH', 1000),
    resolutions: Object.freeze(resolutions),
    defaultResolution,
    minDuration,
    maxDuration,
    defaultDuration,
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const endpoint = readString(env, 'AZURE_OPENAI_ENDPOINT').replace(/\/+$/, '')
  try {
    new URL(endpoint)
  } catch {
    throw new ConfigError(`AZURE_OPENAI_ENDPOINT is not a valid URL: ${endpoint}`)
  }

  const config: AppConfig = {
    provider: {
      apiKey: readString(env, 'AZURE_OPENAI_API_KEY'),
      endpoint,
      apiVersion: readString(env, 'AZURE_OPENAI_API_VERSION', 'preview'),
      deployment: readString(env, 'AZURE_OPENAI_DEPLOYMENT', 'sora'),
      timeoutMs: readInt(env, 'AZURE_OPENAI_TIMEOUT_MS', 30_000),
    },
    video: loadVideoLimits(env),
    jobs: {
      maxConcurrentJobs: readInt(env, 'MAX_CONCURRENT_JOBS', 10),
      maxStoredJobs: readInt(env, 'MAX_STORED_JOBS', 50),
      pollIntervalMs: readInt(env, 'JOB_POLL_INTERVAL_MS', 2000),
      maxConsecutiveFailures: readInt(env, 'JOB_MAX_CONSECUTIVE_FAILURES', 5, 0),
      cleanupIntervalMs: readInt(env, 'JOB_CLEANUP_INTERVAL_SECONDS', 3600) * 1000,
      maxJobAgeMs: readInt(env, 'JOB_MAX_AGE_SECONDS', 86_400) * 1000,
    },
    server: {
      host: readString(env, 'HOST', '0.0.0.0'),
      port: readInt(env, 'PORT', 8000),
      env: readString(env, 'NODE_ENV', 'development'),
      corsOrigins: Object.freeze(readList(env, 'CORS_ORIGINS', [])),
      rateLimitPerMinute: readInt(env, 'API_RATE_LIMIT_PER_MINUTE', 120),
    },
  }

  Object.freeze(config.provider)
  Object.freeze(config.video)
  Object.freeze(config.jobs)
  Object.freeze(config.server)
  return Object.freeze(config)
}
