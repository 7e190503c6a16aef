/**
 * Error taxonomy shared by the validator, provider client, job store and controller.
 * Routes map these to HTTP status codes in routes/video.ts.
 */

export interface ValidationIssue {
  field: string
  message: string
}

/** Bad user input. Recoverable by resubmitting; never logged as a fault. */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(issues.map((i) => i.message).join('; ') || 'Invalid request')
    this.name = 'ValidationError'
    this.issues = issues
  }
}

/** Too many jobs in flight. Caller should retry later. */
export class CapacityError extends Error {
  readonly limit: number

  constructor(limit: number) {
    super(`Too many video jobs in progress (limit ${limit}). Please retry shortly.`)
    this.name = 'CapacityError'
    this.limit = limit
  }
}

export type ProviderErrorKind = 'auth' | 'rate_limit' | 'invalid_request' | 'transient' | 'unknown'

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind
  /** Upstream HTTP status, when the provider answered at all. */
  readonly status?: number

  constructor(kind: ProviderErrorKind, message: string, status?: number) {
    super(message)
    this.name = 'ProviderError'
    this.kind = kind
    this.status = status
  }

  /** transient and rate_limit are retried by the poller up to the consecutive-failure cap. */
  get retryable(): boolean {
    return this.kind === 'transient' || this.kind === 'rate_limit'
  }
}

export class NotFoundError extends Error {
  readonly id: string

  constructor(id: string) {
    super(`Video job not found: ${id}`)
    this.name = 'NotFoundError'
    this.id = id
  }
}

/** Id collision in the job store. Programming error, not user-facing. */
export class DuplicateIdError extends Error {
  constructor(id: string) {
    super(`Video job already exists: ${id}`)
    this.name = 'DuplicateIdError'
  }
}

/** Attempted transition out of a terminal state. */
export class JobStateError extends Error {
  constructor(id: string, from: string, to: string) {
    super(`Illegal transition for job ${id}: ${from} -> ${to}`)
    this.name = 'JobStateError'
  }
}

/** Video content requested before the job completed. */
export class JobNotReadyError extends Error {
  readonly status: string

  constructor(id: string, status: string) {
    super(`Video for job ${id} is not ready (status: ${status})`)
    this.name = 'JobNotReadyError'
    this.status = status
  }
}

/** Missing or malformed startup configuration. Fatal. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
