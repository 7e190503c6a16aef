import type { Server } from 'http'
import { Readable } from 'stream'
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest'
import { createApp } from '../src/app'
import { loadConfig } from '../src/config'
import { ProviderError, type ProviderErrorKind } from '../src/lib/errors'
import { VideoJobController } from '../src/services/jobController'
import { FakeProvider } from './helpers'

const VIDEO_URL = 'https://example.openai.azure.com/openai/v1/video/generations/gen_1/content/video?api-version=preview'

const config = loadConfig({
  AZURE_OPENAI_API_KEY: 'test-key',
  AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
  JOB_POLL_INTERVAL_MS: '1',
  MAX_CONCURRENT_JOBS: '3',
})

let provider: FakeProvider
let controller: VideoJobController
let server: Server
let baseUrl: string

beforeAll(async () => {
  provider = new FakeProvider()
  controller = new VideoJobController({ provider, video: config.video, jobs: config.jobs })
  const app = createApp({ controller, config })
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s))
  })
  const address = server.address()
  if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port')
  baseUrl = `http://127.0.0.1:${address.port}`
})

afterEach(() => {
  provider.submitResult = { providerJobId: 'provider-job-1' }
  provider.pollScript = []
  provider.pollCalls = 0
})

afterAll(async () => {
  await controller.shutdown()
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
})

function postJson(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
}

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json()
  if (typeof body !== 'object' || body === null) throw new Error('expected a JSON object')
  return { ...body }
}

async function generate(body: unknown): Promise<string> {
  const res = await postJson('/api/video/generate', body)
  expect(res.status).toBe(200)
  return String((await readJson(res)).id)
}

describe('POST /api/video/generate', () => {
  it('starts a job', async () => {
    provider.pollScript = [{ state: 'succeeded', videoUrl: VIDEO_URL }]
    const res = await postJson('/api/video/generate', { prompt: 'a sunset', resolution: '1920x1080', duration: 5 })
    expect(res.status).toBe(200)
    const body = await readJson(res)
    expect(body).toEqual({ video_id: body.id, id: expect.any(String), status: 'pending' })
    await controller.waitForJob(String(body.id))
  })

  it('accepts form posts', async () => {
    provider.pollScript = [{ state: 'succeeded', videoUrl: VIDEO_URL }]
    const res = await fetch(`${baseUrl}/api/video/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'prompt=a+cat&resolution=1280x720&duration=3',
    })
    expect(res.status).toBe(200)
    const id = String((await readJson(res)).id)
    await controller.waitForJob(id)
    expect(controller.getJobStatus(id)).toMatchObject({ resolution: '1280x720', duration: 3, prompt: 'a cat' })
  })

  it('answers 422 for an empty prompt', async () => {
    const res = await postJson('/api/video/generate', { prompt: '', duration: 5 })
    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      message: 'Prompt must be at least 1 character long',
      errors: [{ field: 'prompt', message: 'Prompt must be at least 1 character long' }],
    })
  })

  it('answers 422 for a duration out of range', async () => {
    const res = await postJson('/api/video/generate', { prompt: 'a cat', duration: 20 })
    expect(res.status).toBe(422)
    expect((await readJson(res)).errors).toEqual([
      { field: 'duration', message: 'Duration must be between 1 and 15 seconds' },
    ])
  })

  it('answers 400 for malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/api/video/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"prompt": ',
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ message: 'Request body is not valid JSON' })
  })

  it('surfaces provider auth failures without creating a job', async () => {
    provider.submitResult = new ProviderError('auth', 'Access denied due to invalid subscription key', 401)
    const before = controller.stats().stored
    const res = await postJson('/api/video/generate', { prompt: 'a sunset', duration: 5 })
    expect(res.status).toBe(502)
    expect(await res.json()).toEqual({ message: 'Access denied due to invalid subscription key', kind: 'auth' })
    expect(controller.stats().stored).toBe(before)
  })

  const providerStatuses: Array<[ProviderErrorKind, number]> = [
    ['invalid_request', 400],
    ['rate_limit', 429],
    ['transient', 503],
    ['unknown', 502],
  ]

  it.each(providerStatuses)('maps provider %s to %i', async (kind, status) => {
    provider.submitResult = new ProviderError(kind, 'provider said no')
    const res = await postJson('/api/video/generate', { prompt: 'a sunset' })
    expect(res.status).toBe(status)
  })

  it('answers 429 when the job cap is reached', async () => {
    const ids: string[] = []
    for (let i = 0; i < 3; i++) {
      ids.push(await generate({ prompt: `job ${i}` }))
    }
    const res = await postJson('/api/video/generate', { prompt: 'one too many' })
    expect(res.status).toBe(429)
    expect(res.headers.get('retry-after')).toBe('30')
    expect(await res.json()).toEqual({
      message: 'Too many video jobs in progress (limit 3). Please retry shortly.',
    })

    provider.pollScript = [{ state: 'failed', reason: 'stopped by test' }]
    await Promise.all(ids.map((id) => controller.waitForJob(id)))
  })
})

describe('GET /api/video/status/:id', () => {
  it('returns the completed job', async () => {
    provider.pollScript = [{ state: 'running', progress: 50 }, { state: 'succeeded', videoUrl: VIDEO_URL }]
    const id = await generate({ prompt: 'a sunset', duration: 5 })
    await controller.waitForJob(id)

    const res = await fetch(`${baseUrl}/api/video/status/${id}`)
    expect(res.status).toBe(200)
    expect(res.headers.get('cache-control')).toBe('no-store, no-cache, must-revalidate, proxy-revalidate')
    expect(await res.json()).toMatchObject({
      video_id: id,
      id,
      status: 'completed',
      progress: 100,
      video_url: VIDEO_URL,
      prompt: 'a sunset',
      resolution: '1920x1080',
      duration: 5,
    })
  })

  it('answers 404 for unknown jobs', async () => {
    const res = await fetch(`${baseUrl}/api/video/status/does-not-exist`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ message: 'Video job not found' })
  })
})

describe('GET /api/video/:id/content', () => {
  it('streams the finished video', async () => {
    provider.pollScript = [{ state: 'succeeded', videoUrl: VIDEO_URL }]
    const id = await generate({ prompt: 'a sunset' })
    await controller.waitForJob(id)

    const res = await fetch(`${baseUrl}/api/video/${id}/content`)
    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('video/mp4')
    expect(res.headers.get('content-disposition')).toBe(`attachment; filename="${id}.mp4"`)
    expect(res.headers.get('content-length')).toBe('10')
    expect(await res.text()).toBe('fake-video')
  })

  it('cuts the response when the upstream stream breaks', async () => {
    provider.pollScript = [{ state: 'succeeded', videoUrl: VIDEO_URL }]
    const id = await generate({ prompt: 'a sunset' })
    await controller.waitForJob(id)
    const broken = new Readable({
      read() {
        this.destroy(new Error('upstream reset'))
      },
    })
    vi.spyOn(provider, 'download').mockResolvedValueOnce({ body: broken, contentType: 'video/mp4' })

    await expect(fetch(`${baseUrl}/api/video/${id}/content`).then((res) => res.text())).rejects.toThrow()
    const health = await fetch(`${baseUrl}/healthz`)
    expect(health.status).toBe(200)
  })

  it('answers 409 while the job is still running', async () => {
    provider.pollScript = [{ state: 'running', progress: 10 }]
    const id = await generate({ prompt: 'a sunset' })
    const res = await fetch(`${baseUrl}/api/video/${id}/content`)
    expect(res.status).toBe(409)
    expect((await readJson(res)).message).toBe('Video is not ready yet')

    provider.pollScript = [{ state: 'failed', reason: 'stopped by test' }]
    await controller.waitForJob(id)
  })

  it('answers 404 for unknown jobs', async () => {
    const res = await fetch(`${baseUrl}/api/video/nope/content`)
    expect(res.status).toBe(404)
  })
})

describe('maintenance and health', () => {
  it('runs a manual cleanup', async () => {
    const res = await fetch(`${baseUrl}/api/video/cleanup`, { method: 'POST' })
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ removed: 0, message: 'Old jobs cleaned up successfully (0 removed)' })
  })

  it('reports healthy', async () => {
    const res = await fetch(`${baseUrl}/api/health`)
    expect(await res.json()).toEqual({ status: 'healthy', service: 'sora-video-gateway' })
    expect(await (await fetch(`${baseUrl}/healthz`)).json()).toEqual({ status: 'ok' })
  })

  it('reports config presence without secrets', async () => {
    const body = await (await fetch(`${baseUrl}/configz`)).json()
    expect(body).toMatchObject({ hasProviderKey: true, hasProviderEndpoint: true, providerApiVersion: 'preview' })
    expect(JSON.stringify(body)).not.toContain('test-key')
  })

  it('reports job counts', async () => {
    const body = await (await fetch(`${baseUrl}/ops/jobs`)).json()
    expect(body).toEqual({
      stored: expect.any(Number),
      active: expect.any(Number),
      byStatus: {
        pending: expect.any(Number),
        processing: expect.any(Number),
        completed: expect.any(Number),
        failed: expect.any(Number),
      },
    })
  })

  it('echoes or generates a request id', async () => {
    const echoed = await fetch(`${baseUrl}/api/health`, { headers: { 'x-request-id': 'req-123' } })
    expect(echoed.headers.get('x-request-id')).toBe('req-123')
    const generated = await fetch(`${baseUrl}/api/health`)
    expect(generated.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('answers 404 JSON for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/nothing-here`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ message: 'Not found' })
  })
})
