import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CompositionTimeoutError } from '../lib/errors'
import { createComposeJobQueue, toJobError } from './composeJobs'
import type { ComposeWithTransitionsInput, SimpleConcatenateInput, VideoComposer } from './videoComposer'

const fakeComposer = (overrides: Partial<VideoComposer> = {}): VideoComposer => ({
  composeWithTransitions: vi.fn(async (input: ComposeWithTransitionsInput) => input.outputPath),
  simpleConcatenate: vi.fn(async (input: SimpleConcatenateInput) => input.outputPath),
  probeDuration: vi.fn(() => 8),
  ...overrides
})

describe('composeJobs', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('runs a transition job to completion', async () => {
    const composer = fakeComposer()
    const queue = createComposeJobQueue(() => composer)
    const { job, done } = queue.enqueue({
      mode: 'transitions',
      clipPaths: ['a.mp4', 'b.mp4', 'c.mp4'],
      outputPath: 'outputs/final.mp4',
      transitionType: 'fade',
      transitionDuration: 0.5
    })
    expect(job.status).toBe('queued')
    expect(job.progress).toBe(0)

    await done

    expect(queue.get(job.id)).toMatchObject({
      status: 'complete',
      stage: 'complete',
      progress: 100,
      outputPath: 'outputs/final.mp4',
      error: null
    })
    expect(composer.composeWithTransitions).toHaveBeenCalledWith({
      clipPaths: ['a.mp4', 'b.mp4', 'c.mp4'],
      outputPath: 'outputs/final.mp4',
      transitionType: 'fade',
      transitionDuration: 0.5,
      resolution: undefined
    })
    expect(composer.simpleConcatenate).not.toHaveBeenCalled()
  })

  it('routes concat jobs to simpleConcatenate', async () => {
    const composer = fakeComposer()
    const queue = createComposeJobQueue(() => composer)
    const { done } = queue.enqueue({ mode: 'concat', clipPaths: ['a.mp4', 'b.mp4'], outputPath: 'out.mp4', resolution: '640x360' })
    await done
    expect(composer.simpleConcatenate).toHaveBeenCalledWith({ clipPaths: ['a.mp4', 'b.mp4'], outputPath: 'out.mp4', resolution: '640x360' })
  })

  it('records a composer failure on the job', async () => {
    const composer = fakeComposer({
      composeWithTransitions: vi.fn(async () => {
        throw new CompositionTimeoutError(300_000)
      })
    })
    const queue = createComposeJobQueue(() => composer)
    const { job, done } = queue.enqueue({ mode: 'transitions', clipPaths: ['a.mp4', 'b.mp4'], outputPath: 'out.mp4' })
    await done
    expect(queue.get(job.id)).toMatchObject({
      status: 'failed',
      stage: 'failed',
      outputPath: null,
      error: {
        code: 'COMPOSITION_TIMEOUT',
        message: 'Video composition timed out after 300s. Try with shorter clips or simpler transitions.',
        retryable: false
      }
    })
  })

  it('fails the job when the composer cannot be created', async () => {
    const queue = createComposeJobQueue(() => {
      throw new Error('ffmpeg missing')
    })
    const { job, done } = queue.enqueue({ mode: 'concat', clipPaths: ['a.mp4', 'b.mp4'], outputPath: 'out.mp4' })
    await done
    expect(queue.get(job.id)?.error).toEqual({ code: 'INTERNAL_ERROR', message: 'ffmpeg missing', retryable: false })
  })

  it('runs jobs one after the other', async () => {
    const order: string[] = []
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const composer = fakeComposer({
      simpleConcatenate: vi.fn(async ({ outputPath }: SimpleConcatenateInput) => {
        order.push(`start:${outputPath}`)
        if (outputPath === 'first.mp4') await gate
        order.push(`end:${outputPath}`)
        return outputPath
      })
    })
    const queue = createComposeJobQueue(() => composer)
    const first = queue.enqueue({ mode: 'concat', clipPaths: ['a.mp4', 'b.mp4'], outputPath: 'first.mp4' })
    const second = queue.enqueue({ mode: 'concat', clipPaths: ['a.mp4', 'b.mp4'], outputPath: 'second.mp4' })
    await new Promise((resolve) => setTimeout(resolve, 10))
    expect(queue.get(second.job.id)?.status).toBe('queued')
    release()
    await Promise.all([first.done, second.done])
    expect(order).toEqual(['start:first.mp4', 'end:first.mp4', 'start:second.mp4', 'end:second.mp4'])
    expect(queue.list().map((job) => job.status)).toEqual(['complete', 'complete'])
  })

  it('forgets the oldest finished jobs past the retention limit', async () => {
    const queue = createComposeJobQueue(() => fakeComposer(), { maxFinishedJobs: 2 })
    const submitted = ['one.mp4', 'two.mp4', 'three.mp4'].map((outputPath) =>
      queue.enqueue({ mode: 'concat', clipPaths: ['a.mp4', 'b.mp4'], outputPath })
    )
    await queue.idle()
    expect(queue.get(submitted[0].job.id)).toBeNull()
    expect(queue.list().map((job) => job.request.outputPath)).toEqual(['two.mp4', 'three.mp4'])
  })

  it('maps unknown errors to INTERNAL_ERROR', () => {
    expect(toJobError('boom')).toEqual({ code: 'INTERNAL_ERROR', message: 'boom', retryable: false })
  })
})
