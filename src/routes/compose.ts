import express from 'express'
import path from 'path'
import { z } from 'zod'
import { isComposerError, type ComposerErrorCode } from '../lib/errors'
import { TRANSITION_NAME_PATTERN } from '../lib/filterGraph'
import type { ComposeJobQueue } from '../services/composeJobs'
import type { VideoComposer } from '../services/videoComposer'

const composeRequestSchema = z.object({
  clipPaths: z.array(z.string().min(1)).min(2),
  outputName: z.string().min(1).optional(),
  mode: z.enum(['transitions', 'concat']).default('transitions'),
  transitionType: z.string().regex(TRANSITION_NAME_PATTERN, 'Transition type must be a plain xfade name').optional(),
  transitionDuration: z.number().positive().optional(),
  resolution: z.string().regex(/^\d+x\d+$/i).optional()
})

const probeRequestSchema = z.object({
  path: z.string().min(1)
})

const STATUS_BY_CODE: Partial<Record<ComposerErrorCode, number>> = {
  INVALID_COMPOSITION: 400,
  INSUFFICIENT_CLIPS: 400,
  MISSING_INPUT: 404,
  MISSING_BINARY: 503,
  COMPOSITION_TIMEOUT: 504
}

const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, res: express.Response): T | null => {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    res.status(400).json({
      error: 'invalid_payload',
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    })
    return null
  }
  return parsed.data
}

export const sendComposerError = (res: express.Response, error: unknown) => {
  if (isComposerError(error)) {
    return res.status(STATUS_BY_CODE[error.code] ?? 500).json({
      error: error.code.toLowerCase(),
      message: error.message,
      retryable: error.retryable
    })
  }
  console.error('[compose] unexpected error', error)
  return res.status(500).json({ error: 'server_error', message: 'Unexpected error', retryable: false })
}

const defaultOutputName = () => `property_video_${new Date().toISOString().replace(/[:.]/g, '-')}.mp4`

export type ComposeRouterOptions = {
  outputDir: string
  queue: ComposeJobQueue
  getComposer: () => VideoComposer
}

export const createComposeRouter = ({ outputDir, queue, getComposer }: ComposeRouterOptions) => {
  const router = express.Router()

  router.post('/probe', (req, res) => {
    const body = parseWith(probeRequestSchema, req.body, res)
    if (!body) return
    try {
      const durationSeconds = getComposer().probeDuration(body.path)
      return res.json({ path: body.path, durationSeconds })
    } catch (error) {
      return sendComposerError(res, error)
    }
  })

  router.post('/compose', (req, res) => {
    const body = parseWith(composeRequestSchema, req.body, res)
    if (!body) return
    // only a bare file name is honoured, output stays inside outputDir
    const outputName = path.basename(body.outputName || defaultOutputName())
    const { job } = queue.enqueue({
      mode: body.mode,
      clipPaths: body.clipPaths,
      outputPath: path.join(outputDir, outputName),
      transitionType: body.transitionType,
      transitionDuration: body.transitionDuration,
      resolution: body.resolution
    })
    return res.status(202).json({ job })
  })

  router.get('/compose', (_req, res) => {
    return res.json({ jobs: queue.list() })
  })

  router.get('/compose/:id', (req, res) => {
    const job = queue.get(req.params.id)
    if (!job) return res.status(404).json({ error: 'not_found', message: 'Job not found' })
    return res.json({ job })
  })

  return router
}
