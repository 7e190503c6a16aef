import { Readable } from 'stream'
import type { JobLimits, VideoLimits } from '../src/config'
import { DEFAULT_RESOLUTIONS } from '../src/config'
import type {
  ProviderJobHandle,
  ProviderStatus,
  VideoContent,
  VideoProvider,
} from '../src/services/videoProvider'
import type { NormalizedVideoRequest } from '../src/utils/videoRequest'

export const videoLimits: VideoLimits = {
  promptMaxLength: 1000,
  resolutions: DEFAULT_RESOLUTIONS,
  defaultResolution: '1920x1080',
  minDuration: 1,
  maxDuration: 15,
  defaultDuration: 5,
}

export function jobLimits(overrides: Partial<JobLimits> = {}): JobLimits {
  return {
    maxConcurrentJobs: 10,
    maxStoredJobs: 50,
    pollIntervalMs: 1,
    maxConsecutiveFailures: 3,
    cleanupIntervalMs: 60_000,
    maxJobAgeMs: 60 * 60 * 1000,
    ...overrides,
  }
}

/**
 * In-process provider. Each poll consumes the next scripted step; the last step repeats.
 * An empty script answers "queued" forever.
 */
export class FakeProvider implements VideoProvider {
  readonly name = 'fake'
  submitResult: ProviderJobHandle | Error = { providerJobId: 'provider-job-1' }
  pollScript: Array<ProviderStatus | Error> = []
  contentBytes = 'fake-video'
  readonly submitted: NormalizedVideoRequest[] = []
  readonly downloaded: string[] = []
  pollCalls = 0

  async submit(request: NormalizedVideoRequest): Promise<ProviderJobHandle> {
    this.submitted.push(request)
    if (this.submitResult instanceof Error) throw this.submitResult
    return this.submitResult
  }

  async poll(): Promise<ProviderStatus> {
    const index = Math.min(this.pollCalls, this.pollScript.length - 1)
    this.pollCalls++
    if (index < 0) return { state: 'queued' }
    const step = this.pollScript[index]
    if (step instanceof Error) throw step
    return step
  }

  async download(videoUrl: string): Promise<VideoContent> {
    this.downloaded.push(videoUrl)
    return {
      body: Readable.from([Buffer.from(this.contentBytes)]),
      contentType: 'video/mp4',
      contentLength: Buffer.byteLength(this.contentBytes),
    }
  }
}
