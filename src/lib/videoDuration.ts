import fs from 'fs'
import { DurationUnresolvedError, MissingInputError, getErrorMessage } from './errors'
import { firstSuccessful, type FallbackStrategy } from './fallback'
import { processMediaToolRunner, type MediaToolRunner } from './ffmpeg'
import { readMp4Duration } from './mp4Atoms'

const DEFAULT_PROBE_TIMEOUT_MS = 30_000
const DEFAULT_FFMPEG_PATH = 'ffmpeg'
const DURATION_PATTERN = /Duration:\s*([0-9]+):([0-9]+):([0-9]+(?:\.[0-9]+)?)/

export type ProbeOptions = {
  // null skips ffmpeg and goes straight to the MP4 parser
  ffmpegPath?: string | null
  runner?: MediaToolRunner
  timeoutMs?: number
}

export const parseDurationText = (output: string) => {
  const match = output.match(DURATION_PATTERN)
  if (!match) return null
  const hours = Number.parseFloat(match[1])
  const minutes = Number.parseFloat(match[2])
  const seconds = Number.parseFloat(match[3])
  if (!Number.isFinite(hours) || !Number.isFinite(minutes) || !Number.isFinite(seconds)) return null
  const total = hours * 3600 + minutes * 60 + seconds
  return Number.isFinite(total) ? total : null
}

const runMediaTool = (runner: MediaToolRunner, ffmpegPath: string, filePath: string, timeoutMs: number) => {
  try {
    return runner.runSync(ffmpegPath, ['-hide_banner', '-i', filePath], { timeoutMs })
  } catch (error) {
    console.warn(`[duration] FFmpeg not available (${getErrorMessage(error)}), falling back to MP4 parser`)
    return null
  }
}

const ffmpegStrategy = (options: ProbeOptions): FallbackStrategy<string, number> => ({
  label: 'ffmpeg',
  attempt: (filePath) => {
    const ffmpegPath = options.ffmpegPath === undefined ? DEFAULT_FFMPEG_PATH : options.ffmpegPath
    if (!ffmpegPath) return null
    const runner = options.runner ?? processMediaToolRunner
    const result = runMediaTool(runner, ffmpegPath, filePath, options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS)
    if (!result) return null
    // `ffmpeg -i` without an output exits non-zero but still prints the header
    return parseDurationText(`${result.stderr}\n${result.stdout}`)
  }
})

const mp4AtomStrategy: FallbackStrategy<string, number> = {
  label: 'mp4_atom',
  attempt: readMp4Duration
}

export const probeVideoDuration = (filePath: string, options: ProbeOptions = {}) => {
  if (!fs.existsSync(filePath)) throw new MissingInputError(filePath)

  const resolved = firstSuccessful([ffmpegStrategy(options), mp4AtomStrategy], filePath)
  if (!resolved.ok) throw new DurationUnresolvedError(filePath, resolved.reasons)

  if (resolved.label !== 'ffmpeg') {
    console.log(`[duration] resolved via ${resolved.label}: ${resolved.value.toFixed(3)}s`, filePath)
  }
  return resolved.value
}
