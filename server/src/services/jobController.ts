import { setTimeout as sleep } from 'timers/promises'
import { v4 as uuidv4 } from 'uuid'
import type pino from 'pino'
import type { JobLimits, VideoLimits } from '../config'
import {
  CapacityError,
  JobNotReadyError,
  NotFoundError,
  ProviderError,
  errorMessage,
} from '../lib/errors'
import { getLogger, redactPrompt, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import { JobStore, type JobStoreStats } from '../models/JobStore'
import {
  createVideoJob,
  isTerminal,
  markCompleted,
  markFailed,
  markProcessing,
  toVideoJobView,
  type VideoJobView,
} from '../models/VideoJob'
import { validateVideoRequest, type VideoRequestInput } from '../utils/videoRequest'
import {
  isAbortError,
  toProviderError,
  type ProviderJobHandle,
  type ProviderStatus,
  type VideoContent,
  type VideoProvider,
} from './videoProvider'

export interface SubmitResult {
  id: string
  status: 'pending'
}

export interface ControllerStats extends JobStoreStats {
  active: number
}

export interface VideoJobControllerOptions {
  provider: VideoProvider
  video: VideoLimits
  jobs: JobLimits
  store?: JobStore
  logger?: pino.Logger
  now?: () => number
}

interface PollTask {
  abort: AbortController
  done: Promise<void>
}

export function timeoutMessage(failures: number): string {
  return `Timed out waiting for provider after ${failures} consecutive errors`
}

/**
 * Owns the job store and one polling task per in-flight job.
 * Each task is the only writer of its job's record; everything else reads through the store.
 */
export class VideoJobController {
  readonly store: JobStore
  private readonly provider: VideoProvider
  private readonly video: VideoLimits
  private readonly jobs: JobLimits
  private readonly log: pino.Logger
  private readonly now: () => number
  private readonly tasks = new Map<string, PollTask>()
  /** Submissions waiting on the provider; they count against the concurrency cap. */
  private submitting = 0
  private sweepTimer: NodeJS.Timeout | null = null
  private stopped = false

  constructor(options: VideoJobControllerOptions) {
    this.provider = options.provider
    this.video = options.video
    this.jobs = options.jobs
    this.store = options.store ?? new JobStore(options.jobs.maxStoredJobs)
    this.log = options.logger ?? getLogger('api')
    this.now = options.now ?? Date.now
  }

  get activeJobs(): number {
    return this.tasks.size + this.submitting
  }

  /** Validate, hand the job to the provider, record it and start polling. Does not wait for the video. */
  async submitJob(input: VideoRequestInput): Promise<SubmitResult> {
    const request = validateVideoRequest(input, this.video)

    if (this.stopped || this.activeJobs >= this.jobs.maxConcurrentJobs) {
      this.log.warn({ msg: 'Job capacity reached', active: this.activeJobs, limit: this.jobs.maxConcurrentJobs })
      throw new CapacityError(this.jobs.maxConcurrentJobs)
    }

    this.submitting++
    let handle: ProviderJobHandle
    try {
      handle = await this.provider.submit(request)
    } catch (err) {
      const error = toProviderError(err)
      this.log.warn({
        msg: 'Provider rejected submission',
        kind: error instanceof ProviderError ? error.kind : error.name,
        status: error instanceof ProviderError ? error.status : undefined,
        error: error.message,
      })
      throw error
    } finally {
      this.submitting--
    }

    const id = uuidv4()
    const job = createVideoJob({
      id,
      request,
      providerJobId: handle.providerJobId,
      revisedPrompt: handle.revisedPrompt,
      now: this.now(),
    })
    this.store.put(job)
    if (this.stopped) {
      // Accepted while shutting down: keep the record, but no new polling task.
      this.log.warn({
        msg: 'Video job accepted during shutdown; not polling',
        jobId: id,
        providerJobId: handle.providerJobId,
      })
      return { id, status: 'pending' }
    }
    this.startPolling(id, handle)

    this.log.info({
      msg: 'Video job submitted',
      jobId: id,
      providerJobId: handle.providerJobId,
      prompt: redactPrompt(request.prompt),
      resolution: request.resolution,
      duration: request.duration,
    })
    return { id, status: 'pending' }
  }

  getJobStatus(id: string): VideoJobView {
    return toVideoJobView(this.store.get(id))
  }

  async getVideoContent(id: string): Promise<VideoContent> {
    const job = this.store.get(id)
    if (job.status !== 'completed' || !job.videoUrl) {
      throw new JobNotReadyError(id, job.status)
    }
    try {
      return await this.provider.download(job.videoUrl)
    } catch (err) {
      throw toProviderError(err)
    }
  }

  cleanup(): { removed: number } {
    const removed = this.store.sweepStale(this.jobs.maxJobAgeMs, this.now())
    if (removed > 0) {
      this.log.info({ msg: 'Removed stale video jobs', removed })
    }
    return { removed }
  }

  healthcheck(): { status: 'healthy' } {
    return { status: 'healthy' }
  }

  stats(): ControllerStats {
    return { ...this.store.stats(), active: this.tasks.size }
  }

  /** Start the periodic stale-job sweep. */
  start(): void {
    if (this.sweepTimer) return
    this.sweepTimer = setInterval(() => this.cleanup(), this.jobs.cleanupIntervalMs)
    this.sweepTimer.unref()
  }

  /** Abort every polling task and the sweep. Records keep their last known state. */
  async shutdown(): Promise<void> {
    this.stopped = true
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
    const tasks = [...this.tasks.values()]
    for (const task of tasks) task.abort.abort()
    await Promise.allSettled(tasks.map((t) => t.done))
    if (tasks.length > 0) {
      this.log.info({ msg: 'Stopped polling tasks', count: tasks.length })
    }
  }

  /** Resolves once the job's polling task has finished (immediately if none is running). */
  async waitForJob(id: string): Promise<void> {
    await this.tasks.get(id)?.done
  }

  private startPolling(id: string, handle: ProviderJobHandle): void {
    const abort = new AbortController()
    const log = withJobContext(id, handle.providerJobId)
    const done = this.pollUntilDone(id, handle, abort.signal, log)
      .catch((err: unknown) => {
        if (abort.signal.aborted || isAbortError(err)) {
          log.debug({ msg: 'Polling stopped' })
          return
        }
        log.error({ msg: 'Polling task crashed', err })
        captureJobError(id, handle.providerJobId, err)
        this.failJob(id, errorMessage(err), log)
      })
      .finally(() => {
        this.tasks.delete(id)
      })
    this.tasks.set(id, { abort, done })
  }

  private async pollUntilDone(
    id: string,
    handle: ProviderJobHandle,
    signal: AbortSignal,
    log: pino.Logger
  ): Promise<void> {
    let consecutiveFailures = 0
    let consecutiveUnknown = 0

    while (!signal.aborted) {
      await sleep(this.jobs.pollIntervalMs, undefined, { signal })

      let status: ProviderStatus
      try {
        status = await this.provider.poll(handle, signal)
      } catch (err) {
        const error = toProviderError(err)
        if (!(error instanceof ProviderError)) throw error

        consecutiveFailures++
        consecutiveUnknown = error.kind === 'unknown' ? consecutiveUnknown + 1 : 0

        // auth and invalid_request will not get better by asking again
        if (!error.retryable && error.kind !== 'unknown') {
          log.warn({ msg: 'Provider refused status check', kind: error.kind, error: error.message })
          this.failJob(id, error.message, log)
          return
        }
        if (consecutiveUnknown > 1) {
          log.warn({ msg: 'Repeated unknown provider error', error: error.message })
          this.failJob(id, error.message, log)
          return
        }
        // the first unknown error always gets its one retry, whatever the cap
        if (error.kind !== 'unknown' && consecutiveFailures > this.jobs.maxConsecutiveFailures) {
          log.warn({ msg: 'Provider error cap reached', failures: consecutiveFailures, error: error.message })
          this.failJob(id, timeoutMessage(consecutiveFailures), log)
          return
        }
        log.info({ msg: 'Provider poll failed; will retry', kind: error.kind, failures: consecutiveFailures })
        continue
      }

      consecutiveFailures = 0
      consecutiveUnknown = 0
      if (this.applyStatus(id, status, log)) return
    }
  }

  /** Apply one poll result. Returns true once the job is terminal. */
  private applyStatus(id: string, status: ProviderStatus, log: pino.Logger): boolean {
    switch (status.state) {
      case 'queued':
        return false
      case 'running': {
        const { progress } = status
        this.store.update(id, (job) => markProcessing(job, progress, this.now()))
        return false
      }
      case 'succeeded': {
        const { videoUrl } = status
        this.store.update(id, (job) => markCompleted(job, videoUrl, this.now()))
        log.info({ msg: 'Video job completed' })
        return true
      }
      case 'failed':
        this.failJob(id, status.reason, log)
        return true
    }
  }

  private failJob(id: string, reason: string, log: pino.Logger): void {
    const job = this.store.find(id)
    if (!job || isTerminal(job.status)) return
    this.store.update(id, (current) => markFailed(current, reason, this.now()))
    log.warn({ msg: 'Video job failed', reason })
  }
}
