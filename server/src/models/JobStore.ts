import { DuplicateIdError, NotFoundError } from '../lib/errors'
import { isTerminal, type VideoJob, type VideoJobStatus } from './VideoJob'

export type JobMutator = (job: Readonly<VideoJob>) => VideoJob

export interface JobStoreStats {
  stored: number
  byStatus: Record<VideoJobStatus, number>
}

/**
 * In-memory job records keyed by id. Volatile: a restart loses all history.
 *
 * Records are frozen and replaced whole on every update, so a reader holding a record
 * never sees a half-applied transition. Mutators run synchronously; nothing interleaves
 * between reading the current record and storing the next one.
 */
export class JobStore {
  private readonly jobs = new Map<string, Readonly<VideoJob>>()

  constructor(private readonly maxStoredJobs: number) {}

  get size(): number {
    return this.jobs.size
  }

  put(job: VideoJob): void {
    if (this.jobs.has(job.id)) {
      throw new DuplicateIdError(job.id)
    }
    this.jobs.set(job.id, Object.freeze({ ...job }))
    this.evictIfOverCapacity()
  }

  get(id: string): Readonly<VideoJob> {
    const job = this.jobs.get(id)
    if (!job) throw new NotFoundError(id)
    return job
  }

  find(id: string): Readonly<VideoJob> | undefined {
    return this.jobs.get(id)
  }

  update(id: string, mutator: JobMutator): Readonly<VideoJob> {
    const current = this.get(id)
    const next = Object.freeze({ ...mutator(current), id: current.id })
    this.jobs.set(id, next)
    if (isTerminal(next.status) && !isTerminal(current.status)) {
      this.evictIfOverCapacity()
    }
    return next
  }

  /**
   * Drop the oldest terminal records (by createdAt) until the store is back at capacity.
   * Non-terminal jobs are never evicted, so the store may stay above capacity while they run.
   */
  evictIfOverCapacity(): string[] {
    const evicted: string[] = []
    if (this.jobs.size <= this.maxStoredJobs) return evicted

    const terminal = [...this.jobs.values()]
      .filter((job) => isTerminal(job.status))
      .sort((a, b) => a.createdAt - b.createdAt)

    for (const job of terminal) {
      if (this.jobs.size <= this.maxStoredJobs) break
      this.jobs.delete(job.id)
      evicted.push(job.id)
    }
    return evicted
  }

  /** Remove terminal records created more than maxAgeMs ago. Returns how many were removed. */
  sweepStale(maxAgeMs: number, now: number = Date.now()): number {
    let removed = 0
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.status) && now - job.createdAt > maxAgeMs) {
        this.jobs.delete(id)
        removed++
      }
    }
    return removed
  }

  stats(): JobStoreStats {
    const byStatus: Record<VideoJobStatus, number> = { pending: 0, processing: 0, completed: 0, failed: 0 }
    for (const job of this.jobs.values()) {
      byStatus[job.status]++
    }
    return { stored: this.jobs.size, byStatus }
  }
}
