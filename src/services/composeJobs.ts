import crypto from 'crypto'
import { getErrorMessage, isComposerError } from '../lib/errors'
import type { VideoComposer } from './videoComposer'

export type ComposeMode = 'transitions' | 'concat'
export type ComposeJobStatus = 'queued' | 'running' | 'complete' | 'failed'
export type ComposeJobStage = 'queued' | 'composing' | 'complete' | 'failed'

export type ComposeJobRequest = {
  mode: ComposeMode
  clipPaths: string[]
  outputPath: string
  transitionType?: string
  transitionDuration?: number
  resolution?: string
}

export type ComposeJobError = {
  code: string
  message: string
  retryable: boolean
}

export type ComposeJob = {
  id: string
  status: ComposeJobStatus
  stage: ComposeJobStage
  progress: number
  message: string
  request: ComposeJobRequest
  outputPath: string | null
  error: ComposeJobError | null
  createdAt: string
  updatedAt: string
}

export const toJobError = (error: unknown): ComposeJobError => {
  if (isComposerError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable }
  }
  return { code: 'INTERNAL_ERROR', message: getErrorMessage(error), retryable: false }
}

const runRequest = (composer: VideoComposer, request: ComposeJobRequest) => {
  if (request.mode === 'concat') {
    return composer.simpleConcatenate({
      clipPaths: request.clipPaths,
      outputPath: request.outputPath,
      resolution: request.resolution
    })
  }
  return composer.composeWithTransitions({
    clipPaths: request.clipPaths,
    outputPath: request.outputPath,
    transitionType: request.transitionType,
    transitionDuration: request.transitionDuration,
    resolution: request.resolution
  })
}

export const DEFAULT_MAX_FINISHED_JOBS = 200

export type ComposeJobQueueOptions = {
  // finished jobs beyond this are forgotten, oldest first
  maxFinishedJobs?: number
}

const isFinished = (job: ComposeJob) => job.status === 'complete' || job.status === 'failed'

/**
 * In-memory queue of composition jobs. Jobs run one at a time, the way a
 * single task worker would; retries are left to whoever submitted the job.
 */
export const createComposeJobQueue = (
  getComposer: () => VideoComposer,
  { maxFinishedJobs = DEFAULT_MAX_FINISHED_JOBS }: ComposeJobQueueOptions = {}
) => {
  const jobs = new Map<string, ComposeJob>()
  let tail: Promise<void> = Promise.resolve()

  const pruneFinished = () => {
    const finished = Array.from(jobs.values()).filter(isFinished)
    for (const job of finished.slice(0, Math.max(0, finished.length - maxFinishedJobs))) {
      jobs.delete(job.id)
    }
  }

  const update = (job: ComposeJob, patch: Partial<Omit<ComposeJob, 'id' | 'request' | 'createdAt'>>) => {
    Object.assign(job, patch, { updatedAt: new Date().toISOString() })
    console.log(`[jobs] ${job.id} ${job.stage} (${job.progress}%) ${job.message}`)
  }

  const execute = async (job: ComposeJob) => {
    update(job, { status: 'running', stage: 'composing', progress: 50, message: 'Composing final video...' })
    try {
      const outputPath = await runRequest(getComposer(), job.request)
      update(job, { status: 'complete', stage: 'complete', progress: 100, message: 'Video ready', outputPath })
    } catch (error) {
      const jobError = toJobError(error)
      console.error(`[jobs] ${job.id} failed`, jobError)
      update(job, { status: 'failed', stage: 'failed', message: jobError.message, error: jobError })
    }
    pruneFinished()
  }

  const enqueue = (request: ComposeJobRequest) => {
    const now = new Date().toISOString()
    const job: ComposeJob = {
      id: crypto.randomUUID(),
      status: 'queued',
      stage: 'queued',
      progress: 0,
      message: 'Waiting for worker',
      request,
      outputPath: null,
      error: null,
      createdAt: now,
      updatedAt: now
    }
    jobs.set(job.id, job)
    const done = tail.then(() => execute(job))
    tail = done
    return { job, done }
  }

  return {
    enqueue,
    get: (id: string) => jobs.get(id) ?? null,
    list: () => Array.from(jobs.values()),
    idle: () => tail
  }
}

export type ComposeJobQueue = ReturnType<typeof createComposeJobQueue>
