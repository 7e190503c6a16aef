import { Readable } from 'stream'
import { AzureOpenAI, type ClientOptions } from 'openai'
import type { ProviderConfig } from '../config'
import { ProviderError } from '../lib/errors'
import type { NormalizedVideoRequest } from '../utils/videoRequest'
import {
  classifyHttpStatus,
  toProviderError,
  type ProviderJobHandle,
  type ProviderStatus,
  type VideoContent,
  type VideoProvider,
} from './videoProvider'

/** Body of POST /video/generations/jobs. */
export interface SoraJobRequest {
  model: string
  prompt: string
  width: number
  height: number
  n_seconds: number
  n_variants: number
}

/** The two Sora job calls, as made through the SDK. Swapped for a stub in tests. */
export interface SoraApi {
  createJob(body: SoraJobRequest, signal?: AbortSignal): Promise<unknown>
  getJob(jobId: string, signal?: AbortSignal): Promise<unknown>
}

interface SoraJob {
  id: string
  status: string
  progress?: number
  failureReason?: string
  generationIds: string[]
  revisedPrompt?: string
}

/** Estimated progress per provider state; Azure does not always report a percentage. */
const STATE_PROGRESS: Record<string, number> = {
  preprocessing: 10,
  running: 50,
  processing: 90,
}

/** `fetch` replaces the SDK's HTTP transport; tests use it to observe the wire requests. */
export function createSoraApi(config: ProviderConfig, fetch?: ClientOptions['fetch']): SoraApi {
  const client = new AzureOpenAI({
    apiKey: config.apiKey,
    endpoint: config.endpoint,
    apiVersion: config.apiVersion,
    timeout: config.timeoutMs,
    // Retry policy belongs to the job poller.
    maxRetries: 0,
    fetch,
  })
  return {
    createJob: (body, signal) => client.post('/v1/video/generations/jobs', { body, signal }),
    getJob: (jobId, signal) => client.get(`/v1/video/generations/jobs/${encodeURIComponent(jobId)}`, { signal }),
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseSoraJob(raw: unknown): SoraJob {
  if (!isRecord(raw) || typeof raw.id !== 'string' || typeof raw.status !== 'string') {
    throw new ProviderError('unknown', 'Malformed job payload from video provider')
  }
  const generationIds = Array.isArray(raw.generations)
    ? raw.generations.flatMap((g) => (isRecord(g) && typeof g.id === 'string' ? [g.id] : []))
    : []
  return {
    id: raw.id,
    status: raw.status.toLowerCase(),
    progress: typeof raw.progress === 'number' ? raw.progress : undefined,
    failureReason: typeof raw.failure_reason === 'string' && raw.failure_reason ? raw.failure_reason : undefined,
    generationIds,
    revisedPrompt: typeof raw.revised_prompt === 'string' && raw.revised_prompt ? raw.revised_prompt : undefined,
  }
}

export class AzureSoraProvider implements VideoProvider {
  readonly name = 'azure-openai-sora'

  constructor(
    private readonly config: ProviderConfig,
    private readonly api: SoraApi = createSoraApi(config)
  ) {}

  async submit(request: NormalizedVideoRequest, signal?: AbortSignal): Promise<ProviderJobHandle> {
    let raw: unknown
    try {
      raw = await this.api.createJob(
        {
          model: this.config.deployment,
          prompt: request.prompt,
          width: request.width,
          height: request.height,
          n_seconds: request.duration,
          n_variants: 1,
        },
        signal
      )
    } catch (err) {
      throw toProviderError(err)
    }
    const job = parseSoraJob(raw)
    return job.revisedPrompt
      ? { providerJobId: job.id, revisedPrompt: job.revisedPrompt }
      : { providerJobId: job.id }
  }

  async poll(handle: ProviderJobHandle, signal?: AbortSignal): Promise<ProviderStatus> {
    let raw: unknown
    try {
      raw = await this.api.getJob(handle.providerJobId, signal)
    } catch (err) {
      throw toProviderError(err)
    }
    const job = parseSoraJob(raw)

    switch (job.status) {
      case 'queued':
        return { state: 'queued' }
      case 'preprocessing':
      case 'running':
      case 'processing':
        return { state: 'running', progress: job.progress ?? STATE_PROGRESS[job.status] }
      case 'succeeded': {
        const generationId = job.generationIds[0]
        if (!generationId) return { state: 'failed', reason: 'Provider returned no video' }
        return { state: 'succeeded', videoUrl: this.contentUrl(generationId) }
      }
      case 'failed':
        return { state: 'failed', reason: job.failureReason ?? 'Video generation failed' }
      case 'cancelled':
        return { state: 'failed', reason: 'Video generation was cancelled' }
      default:
        throw new ProviderError('unknown', `Unexpected job status from video provider: ${job.status}`)
    }
  }

  /** Content URLs need the API key, so the bytes are fetched here and proxied by the API. */
  async download(videoUrl: string, signal?: AbortSignal): Promise<VideoContent> {
    if (!videoUrl.startsWith(`${this.config.endpoint}/`)) {
      throw new ProviderError('invalid_request', 'Video URL does not belong to the configured provider')
    }
    const timeout = AbortSignal.timeout(this.config.timeoutMs)
    let res: Response
    try {
      res = await fetch(videoUrl, {
        headers: { 'api-key': this.config.apiKey },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new ProviderError('transient', 'Video download timed out')
      }
      throw toProviderError(err)
    }
    if (!res.ok) {
      throw new ProviderError(
        classifyHttpStatus(res.status),
        `Video download failed with status ${res.status}`,
        res.status
      )
    }
    if (!res.body) {
      throw new ProviderError('unknown', 'Video download returned no content')
    }
    const length = Number(res.headers.get('content-length'))
    return {
      body: Readable.fromWeb(res.body),
      contentType: res.headers.get('content-type') || 'video/mp4',
      contentLength: Number.isInteger(length) && length > 0 ? length : undefined,
    }
  }

  private contentUrl(generationId: string): string {
    const version = encodeURIComponent(this.config.apiVersion)
    return `${this.config.endpoint}/openai/v1/video/generations/${encodeURIComponent(generationId)}/content/video?api-version=${version}`
  }
}
