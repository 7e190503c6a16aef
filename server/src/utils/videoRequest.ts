import type { VideoLimits } from '../config'
import { ValidationError, type ValidationIssue } from '../lib/errors'

/** Raw generation request as it arrives from JSON or an HTML form. */
export interface VideoRequestInput {
  prompt?: unknown
  resolution?: unknown
  duration?: unknown
}

export interface NormalizedVideoRequest {
  prompt: string
  resolution: string
  width: number
  height: number
  duration: number
}

/** Pick the request fields out of a parsed body; anything that is not an object yields no fields. */
export function readVideoRequestInput(body: unknown): VideoRequestInput {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {}
  const fields: Record<string, unknown> = { ...body }
  return { prompt: fields.prompt, resolution: fields.resolution, duration: fields.duration }
}

function validatePrompt(value: unknown, limits: VideoLimits, issues: ValidationIssue[]): string {
  if (value === undefined || value === null) {
    issues.push({ field: 'prompt', message: 'Prompt is required' })
    return ''
  }
  if (typeof value !== 'string') {
    issues.push({ field: 'prompt', message: 'Prompt must be a string' })
    return ''
  }
  const prompt = value.trim()
  if (prompt.length < 1) {
    issues.push({ field: 'prompt', message: 'Prompt must be at least 1 character long' })
  } else if (prompt.length > limits.promptMaxLength) {
    issues.push({
      field: 'prompt',
      message: `Prompt must be at most ${limits.promptMaxLength} characters long (got ${prompt.length})`,
    })
  }
  return prompt
}

function validateResolution(value: unknown, limits: VideoLimits, issues: ValidationIssue[]): string {
  if (value === undefined || value === null || value === '') return limits.defaultResolution
  if (typeof value !== 'string') {
    issues.push({ field: 'resolution', message: 'Resolution must be a string like 1920x1080' })
    return limits.defaultResolution
  }
  const resolution = value.trim().toLowerCase()
  if (!limits.resolutions.includes(resolution)) {
    issues.push({
      field: 'resolution',
      message: `Resolution must be one of ${limits.resolutions.join(', ')}`,
    })
  }
  return resolution
}

/** HTML forms post numbers as strings; accept plain decimal integers only. */
function parseDuration(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return parseInt(value, 10)
  return null
}

function validateDuration(value: unknown, limits: VideoLimits, issues: ValidationIssue[]): number {
  if (value === undefined || value === null || value === '') return limits.defaultDuration
  const duration = parseDuration(value)
  if (duration === null) {
    issues.push({ field: 'duration', message: 'Duration must be a whole number of seconds' })
    return limits.defaultDuration
  }
  if (duration < limits.minDuration || duration > limits.maxDuration) {
    issues.push({
      field: 'duration',
      message: `Duration must be between ${limits.minDuration} and ${limits.maxDuration} seconds`,
    })
  }
  return duration
}

/**
 * Validate and normalize a generation request. Pure: depends only on input and limits.
 * Reports every failing field at once.
 */
export function validateVideoRequest(input: VideoRequestInput, limits: VideoLimits): NormalizedVideoRequest {
  const issues: ValidationIssue[] = []
  const prompt = validatePrompt(input.prompt, limits, issues)
  const resolution = validateResolution(input.resolution, limits, issues)
  const duration = validateDuration(input.duration, limits, issues)

  if (issues.length > 0) {
    throw new ValidationError(issues)
  }

  const [width, height] = resolution.split('x').map((n) => parseInt(n, 10))
  return { prompt, resolution, width, height, duration }
}
