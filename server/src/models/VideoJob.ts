import { JobStateError } from '../lib/errors'
import type { NormalizedVideoRequest } from '../utils/videoRequest'

export type VideoJobStatus = 'pending' | 'processing' | 'completed' | 'failed'

export interface VideoJob {
  id: string
  status: VideoJobStatus
  progress: number

  // Request (immutable after creation)
  prompt: string
  resolution: string
  duration: number

  // Provider
  providerJobId: string
  revisedPrompt?: string

  // Outcome: at most one of these is set
  videoUrl?: string
  errorMessage?: string

  // Epoch ms
  createdAt: number
  updatedAt: number
}

/** Public shape returned by the status endpoint. */
export interface VideoJobView {
  id: string
  status: VideoJobStatus
  progress: number
  prompt: string
  resolution: string
  duration: number
  video_url?: string
  revised_prompt?: string
  error_message?: string
  created_at: string
  updated_at: string
}

export function isTerminal(status: VideoJobStatus): boolean {
  return status === 'completed' || status === 'failed'
}

export function createVideoJob(params: {
  id: string
  request: NormalizedVideoRequest
  providerJobId: string
  revisedPrompt?: string
  now: number
}): VideoJob {
  const job: VideoJob = {
    id: params.id,
    status: 'pending',
    progress: 0,
    prompt: params.request.prompt,
    resolution: params.request.resolution,
    duration: params.request.duration,
    providerJobId: params.providerJobId,
    createdAt: params.now,
    updatedAt: params.now,
  }
  if (params.revisedPrompt) job.revisedPrompt = params.revisedPrompt
  return job
}

function assertMutable(job: VideoJob, to: VideoJobStatus): void {
  if (isTerminal(job.status)) {
    throw new JobStateError(job.id, job.status, to)
  }
}

function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) return 0
  return Math.min(100, Math.max(0, Math.round(progress)))
}

/** Provider reports work in flight. Progress never goes backwards. */
export function markProcessing(job: VideoJob, progress: number, now: number): VideoJob {
  assertMutable(job, 'processing')
  return {
    ...job,
    status: 'processing',
    progress: Math.max(job.progress, clampProgress(progress)),
    updatedAt: now,
  }
}

export function markCompleted(job: VideoJob, videoUrl: string, now: number): VideoJob {
  assertMutable(job, 'completed')
  return {
    ...job,
    status: 'completed',
    progress: 100,
    videoUrl,
    errorMessage: undefined,
    updatedAt: now,
  }
}

/** Progress stays at its last known value. */
export function markFailed(job: VideoJob, errorMessage: string, now: number): VideoJob {
  assertMutable(job, 'failed')
  return {
    ...job,
    status: 'failed',
    errorMessage,
    videoUrl: undefined,
    updatedAt: now,
  }
}

export function toVideoJobView(job: VideoJob): VideoJobView {
  return {
    id: job.id,
    status: job.status,
    progress: job.progress,
    prompt: job.prompt,
    resolution: job.resolution,
    duration: job.duration,
    ...(job.videoUrl !== undefined && { video_url: job.videoUrl }),
    ...(job.revisedPrompt !== undefined && { revised_prompt: job.revisedPrompt }),
    ...(job.errorMessage !== undefined && { error_message: job.errorMessage }),
    created_at: new Date(job.createdAt).toISOString(),
    updated_at: new Date(job.updatedAt).toISOString(),
  }
}
