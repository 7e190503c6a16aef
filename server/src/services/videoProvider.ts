import type { Readable } from 'stream'
import OpenAI from 'openai'
import { ProviderError } from '../lib/errors'
import type { NormalizedVideoRequest } from '../utils/videoRequest'

/** Opaque handle returned when the provider accepts a job. */
export interface ProviderJobHandle {
  providerJobId: string
  revisedPrompt?: string
}

export type ProviderStatus =
  | { state: 'queued' }
  | { state: 'running'; progress: number }
  | { state: 'succeeded'; videoUrl: string }
  | { state: 'failed'; reason: string }

/** A finished video as a byte stream; the caller must consume or destroy `body`. */
export interface VideoContent {
  body: Readable
  contentType: string
  contentLength?: number
}

/**
 * External video generation service. Implementations make network calls only and keep
 * no state; they never retry. Failures reject with a classified ProviderError.
 */
export interface VideoProvider {
  readonly name: string
  submit(request: NormalizedVideoRequest, signal?: AbortSignal): Promise<ProviderJobHandle>
  poll(handle: ProviderJobHandle, signal?: AbortSignal): Promise<ProviderStatus>
  download(videoUrl: string, signal?: AbortSignal): Promise<VideoContent>
}

export function classifyHttpStatus(status: number): ProviderError['kind'] {
  if (status === 401 || status === 403) return 'auth'
  if (status === 429) return 'rate_limit'
  if (status === 400 || status === 404 || status === 422) return 'invalid_request'
  if (status === 408 || status === 409 || status >= 500) return 'transient'
  return 'unknown'
}

/**
 * Map an SDK or fetch failure onto the provider error taxonomy.
 * Aborts are returned untouched so callers can tell shutdown apart from provider trouble.
 */
export function toProviderError(err: unknown): ProviderError | Error {
  if (err instanceof ProviderError) return err
  if (err instanceof OpenAI.APIUserAbortError) return err
  if (err instanceof Error && err.name === 'AbortError') return err
  // APIConnectionTimeoutError extends APIConnectionError
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderError('transient', err.message || 'Connection to video provider failed')
  }
  if (err instanceof OpenAI.APIError) {
    if (err.status === undefined) return new ProviderError('unknown', err.message)
    return new ProviderError(classifyHttpStatus(err.status), err.message, err.status)
  }
  if (err instanceof TypeError) {
    // fetch() network failures surface as TypeError("fetch failed")
    return new ProviderError('transient', err.message)
  }
  return new ProviderError('unknown', err instanceof Error ? err.message : String(err))
}

export function isAbortError(err: unknown): boolean {
  return err instanceof OpenAI.APIUserAbortError || (err instanceof Error && err.name === 'AbortError')
}
