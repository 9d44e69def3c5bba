import { z } from 'zod'
import { resolveBinaryPath } from './ffmpeg'

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => /^(1|true|yes)$/i.test(String(value || '').trim()))

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? fallback : Number(value)))
    .pipe(z.number().int().positive())

const envSchema = z.object({
  FFMPEG_PATH: z.string().optional(),
  FFMPEG_BIN: z.string().optional(),
  COMPOSE_TIMEOUT_MS: positiveInt(300_000),
  PROBE_TIMEOUT_MS: positiveInt(30_000),
  KEEP_FAILED_OUTPUT: booleanFlag,
  OUTPUT_DIR: z.string().optional(),
  PORT: positiveInt(4000),
  REQUIRE_FFMPEG_ON_STARTUP: booleanFlag
})

export type ComposerConfig = {
  ffmpegPath: string
  renderTimeoutMs: number
  probeTimeoutMs: number
  keepFailedOutput: boolean
}

export type ServerConfig = ComposerConfig & {
  outputDir: string
  port: number
  requireFfmpegOnStartup: boolean
}

export const DEFAULT_COMPOSER_CONFIG: ComposerConfig = {
  ffmpegPath: 'ffmpeg',
  renderTimeoutMs: 300_000,
  probeTimeoutMs: 30_000,
  keepFailedOutput: false
}

export const loadServerConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration: ${issues.join('; ')}`)
  }
  const data = parsed.data
  return {
    ffmpegPath: resolveBinaryPath(data.FFMPEG_PATH || data.FFMPEG_BIN, 'ffmpeg', 'FFMPEG'),
    renderTimeoutMs: data.COMPOSE_TIMEOUT_MS,
    probeTimeoutMs: data.PROBE_TIMEOUT_MS,
    keepFailedOutput: data.KEEP_FAILED_OUTPUT,
    outputDir: String(data.OUTPUT_DIR || '').trim() || 'outputs',
    port: data.PORT,
    requireFfmpegOnStartup: data.REQUIRE_FFMPEG_ON_STARTUP
  }
}
