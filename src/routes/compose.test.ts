import fs from 'fs'
import path from 'path'
import type { Server } from 'http'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { createApp } from '../app'
import type { ServerConfig } from '../lib/env'
import type { MediaToolRunner, MediaToolRunResult } from '../lib/ffmpeg'
import { makeTempDir, movie, mvhdV0, writeFixture } from '../test/mp4Fixture'

const jobResponseSchema = z.object({
  job: z
    .object({
      id: z.string(),
      status: z.string(),
      progress: z.number(),
      outputPath: z.string().nullable(),
      request: z.object({ outputPath: z.string() }).passthrough(),
      error: z.object({ code: z.string(), message: z.string(), retryable: z.boolean() }).nullable()
    })
    .passthrough()
})

const readJob = async (res: Response) => jobResponseSchema.parse(await res.json()).job

const result = (exitCode: number, stdout = '', stderr = ''): MediaToolRunResult => ({ exitCode, stdout, stderr, timedOut: false })

// ffmpeg stand-in: version check passes, probes print nothing useful so the
// mvhd parser answers, renders write a small file at the output path
const fakeRunner = (): MediaToolRunner => ({
  runSync: vi.fn((_binary: string, args: string[]) => (args[0] === '-version' ? result(0, 'ffmpeg version 6.1') : result(1))),
  run: vi.fn(async (_binary: string, args: string[]) => {
    fs.writeFileSync(args[args.length - 1], movie(mvhdV0(1000, 23000)))
    return result(0)
  })
})

describe('compose routes', () => {
  let dir = ''
  let server: Server | null = null
  let baseUrl = ''
  let runner: MediaToolRunner
  let queue: ReturnType<typeof createApp>['queue']

  const start = async (config: Partial<ServerConfig> = {}, deps: { runner?: MediaToolRunner } = { runner }) => {
    const created = createApp({
      config: {
        ffmpegPath: 'ffmpeg',
        renderTimeoutMs: 300_000,
        probeTimeoutMs: 30_000,
        keepFailedOutput: false,
        outputDir: path.join(dir, 'outputs'),
        port: 0,
        requireFfmpegOnStartup: false,
        ...config
      },
      deps
    })
    queue = created.queue
    const listening = created.app.listen(0)
    server = listening
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()))
    const address = listening.address()
    if (!address || typeof address === 'string') throw new Error('test server is not listening on a port')
    baseUrl = `http://127.0.0.1:${address.port}`
  }

  const post = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body)
    })

  beforeEach(() => {
    dir = makeTempDir('routes-')
    runner = fakeRunner()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    const current = server
    server = null
    if (current) await new Promise<void>((resolve) => current.close(() => resolve()))
    vi.restoreAllMocks()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('reports ffmpeg availability on /health', async () => {
    await start()
    const res = await fetch(`${baseUrl}/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true, ffmpeg: { available: true, path: 'ffmpeg' } })
  })

  it('returns 503 on /health when ffmpeg is missing', async () => {
    await start({ ffmpegPath: '__missing_ffmpeg_binary__' }, {})
    const res = await fetch(`${baseUrl}/health`)
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ ok: false, ffmpeg: { available: false, path: '__missing_ffmpeg_binary__' } })
  })

  it('probes a clip duration', async () => {
    await start()
    const clip = writeFixture(dir, 'clip.mp4', movie(mvhdV0(1000, 8000)))
    const res = await post('/api/probe', { path: clip })
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ path: clip, durationSeconds: 8 })
  })

  it('maps a missing probe target to 404', async () => {
    await start()
    const res = await post('/api/probe', { path: path.join(dir, 'gone.mp4') })
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({
      error: 'missing_input',
      message: `Video file not found: ${path.join(dir, 'gone.mp4')}`,
      retryable: false
    })
  })

  it('validates the compose payload', async () => {
    await start()
    const res = await post('/api/compose', { clipPaths: ['only-one.mp4'] })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: 'invalid_payload', issues: [{ path: 'clipPaths' }] })
  })

  it('rejects a transition type that is not a plain name', async () => {
    await start()
    const res = await post('/api/compose', {
      clipPaths: ['a.mp4', 'b.mp4'],
      transitionType: 'fade[a];movie=/etc/hosts[b];[a][b]overlay'
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'invalid_payload',
      issues: [{ path: 'transitionType', message: 'Transition type must be a plain xfade name' }]
    })
    expect(queue.list()).toEqual([])
  })

  it('queues a composition and reports the finished job', async () => {
    await start()
    const clips = ['a.mp4', 'b.mp4', 'c.mp4'].map((name) => writeFixture(dir, name, movie(mvhdV0(1000, 8000))))
    const res = await post('/api/compose', { clipPaths: clips, outputName: '../../escape/final.mp4' })
    expect(res.status).toBe(202)
    const job = await readJob(res)
    expect(job.status).toBe('queued')
    expect(job.request.outputPath).toBe(path.join(dir, 'outputs', 'final.mp4'))

    await queue.idle()

    const statusRes = await fetch(`${baseUrl}/api/compose/${job.id}`)
    expect(statusRes.status).toBe(200)
    expect(await readJob(statusRes)).toMatchObject({ status: 'complete', progress: 100, outputPath: path.join(dir, 'outputs', 'final.mp4') })
    expect(runner.run).toHaveBeenCalledTimes(1)
  })

  it('records a failed job with its error code', async () => {
    await start()
    const res = await post('/api/compose', {
      clipPaths: [path.join(dir, 'missing-1.mp4'), path.join(dir, 'missing-2.mp4')],
      mode: 'concat'
    })
    const job = await readJob(res)
    await queue.idle()
    const finished = await readJob(await fetch(`${baseUrl}/api/compose/${job.id}`))
    expect(finished.status).toBe('failed')
    expect(finished.error).toEqual({
      code: 'MISSING_INPUT',
      message: `Video file not found: ${path.join(dir, 'missing-1.mp4')}`,
      retryable: false
    })
    expect(runner.run).not.toHaveBeenCalled()
  })

  it('returns 404 for an unknown job', async () => {
    await start()
    const res = await fetch(`${baseUrl}/api/compose/does-not-exist`)
    expect(res.status).toBe(404)
  })
})
