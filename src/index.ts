import { createServer } from 'http'
import { loadEnv } from './lib/loadEnv'
import { loadServerConfig, type ServerConfig } from './lib/env'
import { getErrorMessage } from './lib/errors'
import { verifyMediaTool } from './services/videoComposer'
import { createApp } from './app'

const reportFfmpegStartupIssue = (config: ServerConfig, message: string) => {
  if (config.requireFfmpegOnStartup) {
    console.error(`[startup] ${message}`)
    console.error('[startup] REQUIRE_FFMPEG_ON_STARTUP is set, exiting')
    return false
  }

  console.warn(`[startup] ${message}`)
  console.warn('[startup] Continuing without FFmpeg; composition routes will fail until FFmpeg is available')
  return true
}

const start = () => {
  loadEnv()
  const config = loadServerConfig()

  try {
    verifyMediaTool(config.ffmpegPath)
  } catch (error) {
    if (!reportFfmpegStartupIssue(config, getErrorMessage(error))) process.exit(1)
  }

  const { app } = createApp({ config })
  const server = createServer(app)
  server.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`)
  })
}

start()
