import express from 'express'
import cors from 'cors'
import bodyParser from 'body-parser'
import fs from 'fs'
import path from 'path'
import { getErrorMessage } from './lib/errors'
import type { ServerConfig } from './lib/env'
import { createComposeRouter } from './routes/compose'
import { createComposeJobQueue } from './services/composeJobs'
import { createVideoComposer, type ComposerDeps, type VideoComposer } from './services/videoComposer'

export type AppOptions = {
  config: ServerConfig
  deps?: ComposerDeps
}

export const createApp = ({ config, deps = {} }: AppOptions) => {
  const app = express()
  const outputDir = path.resolve(config.outputDir)
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true })
  }

  // built on first use so the server still starts without ffmpeg
  let composer: VideoComposer | null = null
  const getComposer = () => {
    if (!composer) composer = createVideoComposer(config, deps)
    return composer
  }
  const queue = createComposeJobQueue(getComposer)

  app.use(cors())
  app.use(bodyParser.json({ limit: '1mb' }))

  app.get('/health', (_req, res) => {
    try {
      getComposer()
      return res.json({ ok: true, ffmpeg: { available: true, path: config.ffmpegPath } })
    } catch (error) {
      return res.status(503).json({
        ok: false,
        ffmpeg: { available: false, path: config.ffmpegPath, reason: getErrorMessage(error) }
      })
    }
  })

  app.use('/api', createComposeRouter({ outputDir, queue, getComposer }))
  app.use('/outputs', express.static(outputDir))

  return { app, queue }
}
