import fs from 'fs'
import path from 'path'
import { DEFAULT_COMPOSER_CONFIG, type ComposerConfig } from '../lib/env'
import {
  ComposerError,
  CompositionFailedError,
  CompositionTimeoutError,
  InsufficientClipsError,
  InterruptedPipeError,
  MissingBinaryError,
  MissingInputError,
  getErrnoCode,
  getErrorMessage
} from '../lib/errors'
import { formatCommand, processMediaToolRunner, type MediaToolRunner, type MediaToolRunResult } from '../lib/ffmpeg'
import {
  DEFAULT_RESOLUTION,
  buildConcatGraph,
  buildTransitionGraph,
  parseResolution,
  renderFilterGraph,
  type FilterGraph
} from '../lib/filterGraph'
import { assertTransitionDuration } from '../lib/transitionOffsets'
import { probeVideoDuration } from '../lib/videoDuration'

const FAILURE_DETAIL_LIMIT = 3500

export const ENCODE_ARGS = ['-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-pix_fmt', 'yuv420p']

export type ClipDescriptor = {
  path: string
  durationSeconds: number
}

export type ComposeWithTransitionsInput = {
  clipPaths: string[]
  outputPath: string
  transitionType?: string
  transitionDuration?: number
  resolution?: string
}

export type SimpleConcatenateInput = {
  clipPaths: string[]
  outputPath: string
  resolution?: string
}

export type ComposerDeps = {
  runner?: MediaToolRunner
}

export type VideoComposer = {
  composeWithTransitions: (input: ComposeWithTransitionsInput) => Promise<string>
  simpleConcatenate: (input: SimpleConcatenateInput) => Promise<string>
  probeDuration: (filePath: string) => number
}

export const buildRenderArgs = (clipPaths: string[], graph: FilterGraph, outputPath: string) => {
  const inputs = clipPaths.flatMap((clipPath) => ['-i', clipPath])
  return [
    '-y',
    '-hide_banner',
    ...inputs,
    '-filter_complex',
    renderFilterGraph(graph),
    '-map',
    `[${graph.outputLabel}]`,
    ...ENCODE_ARGS,
    outputPath
  ]
}

export const formatMediaToolFailure = (result: MediaToolRunResult) => {
  const detail = [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n')
  const exitCode = result.exitCode !== null ? `exit=${result.exitCode}` : 'exit=unknown'
  const combined = `ffmpeg_failed (${exitCode})${detail ? `\n${detail}` : ''}`
  return combined.length > FAILURE_DETAIL_LIMIT ? combined.slice(-FAILURE_DETAIL_LIMIT) : combined
}

const assertClipsExist = (clipPaths: string[], action: string) => {
  if (clipPaths.length < 2) throw new InsufficientClipsError(clipPaths.length, action)
  for (const clipPath of clipPaths) {
    if (!fs.existsSync(clipPath)) throw new MissingInputError(clipPath)
  }
}

type OutputStamp = { size: number; mtimeMs: number }

const statOutput = (outputPath: string): OutputStamp | null => {
  try {
    const stat = fs.statSync(outputPath)
    return { size: stat.size, mtimeMs: stat.mtimeMs }
  } catch (e) {
    return null
  }
}

// only a file this render created or rewrote counts as its failed output
const wasWrittenSince = (outputPath: string, before: OutputStamp | null) => {
  const after = statOutput(outputPath)
  if (!after) return false
  return !before || after.size !== before.size || after.mtimeMs !== before.mtimeMs
}

const safeUnlink = (filePath: string) => {
  try {
    if (fs.existsSync(filePath)) fs.unlinkSync(filePath)
  } catch (e) {
    console.warn(`[composer] could not remove failed output ${filePath}`, e)
  }
}

export const verifyMediaTool = (ffmpegPath: string, runner: MediaToolRunner = processMediaToolRunner) => {
  let result: MediaToolRunResult
  try {
    result = runner.runSync(ffmpegPath, ['-version'], { timeoutMs: 15_000 })
  } catch (error) {
    throw new MissingBinaryError(ffmpegPath, getErrorMessage(error))
  }
  if (result.exitCode !== 0) {
    throw new MissingBinaryError(ffmpegPath, `ffmpeg -version exited with ${result.exitCode}`)
  }
  const banner = result.stdout.split('\n')[0]?.trim() || 'ffmpeg'
  console.log(`[composer] FFmpeg found: ${banner}`)
  return banner
}

/**
 * Composes measured clips with ffmpeg. Creating the composer checks that
 * the binary runs; every call afterwards is independent of the others.
 */
export const createVideoComposer = (config: Partial<ComposerConfig> = {}, deps: ComposerDeps = {}): VideoComposer => {
  const settings: ComposerConfig = { ...DEFAULT_COMPOSER_CONFIG, ...config }
  const runner = deps.runner ?? processMediaToolRunner
  verifyMediaTool(settings.ffmpegPath, runner)

  const probeDuration = (filePath: string) =>
    probeVideoDuration(filePath, {
      ffmpegPath: settings.ffmpegPath,
      runner,
      timeoutMs: settings.probeTimeoutMs
    })

  const render = async (label: string, clipPaths: string[], graph: FilterGraph, outputPath: string) => {
    const outputDir = path.dirname(outputPath)
    fs.mkdirSync(outputDir || '.', { recursive: true })

    const args = buildRenderArgs(clipPaths, graph, outputPath)
    console.log(`[composer] running ffmpeg ${label}...`)
    console.log(`[composer] command: ${formatCommand(settings.ffmpegPath, args)}`)

    const existing = statOutput(outputPath)
    try {
      let result: MediaToolRunResult
      try {
        result = await runner.run(settings.ffmpegPath, args, { timeoutMs: settings.renderTimeoutMs })
      } catch (error) {
        const code = getErrnoCode(error)
        if (code === 'EPIPE') throw new InterruptedPipeError(getErrorMessage(error))
        if (code === 'ENOENT') throw new MissingBinaryError(settings.ffmpegPath, getErrorMessage(error))
        throw new CompositionFailedError(`Video ${label} failed: ${getErrorMessage(error)}`)
      }

      if (result.timedOut) {
        console.error(`[composer] ffmpeg ${label} timed out after ${settings.renderTimeoutMs}ms`)
        throw new CompositionTimeoutError(
          settings.renderTimeoutMs,
          label === 'composition' ? undefined : 'Try with shorter clips.',
          label
        )
      }
      if (result.exitCode !== 0) {
        const failure = formatMediaToolFailure(result)
        console.error(`[composer] ffmpeg ${label} failed`, failure)
        throw new CompositionFailedError(`Video ${label} failed: ${failure}`, result.stderr, { exitCode: result.exitCode })
      }

      const size = statOutput(outputPath)?.size ?? null
      if (size === null) {
        throw new CompositionFailedError(`FFmpeg completed but output file not found: ${outputPath}`, result.stderr)
      }
      if (size === 0) {
        throw new CompositionFailedError(`FFmpeg created empty output file: ${outputPath}`, result.stderr)
      }
      console.log(`[composer] ${label} completed: ${outputPath} (${size} bytes)`)
    } catch (error) {
      if (!settings.keepFailedOutput && wasWrittenSince(outputPath, existing)) safeUnlink(outputPath)
      if (error instanceof ComposerError) throw error
      throw new CompositionFailedError(`Video ${label} failed: ${getErrorMessage(error)}`)
    }
  }

  const logFinalDuration = (outputPath: string) => {
    try {
      console.log(`[composer] final video duration: ${probeDuration(outputPath).toFixed(3)}s`)
    } catch (error) {
      console.warn(`[composer] could not probe final duration: ${getErrorMessage(error)}`)
    }
  }

  const composeWithTransitions = async ({
    clipPaths,
    outputPath,
    transitionType = 'fade',
    transitionDuration = 0.5,
    resolution = DEFAULT_RESOLUTION
  }: ComposeWithTransitionsInput) => {
    assertClipsExist(clipPaths, 'compose')
    assertTransitionDuration(transitionDuration)
    const frame = parseResolution(resolution)

    console.log(`[composer] composing ${clipPaths.length} videos with ${transitionType} transitions`)
    const clips: ClipDescriptor[] = clipPaths.map((clipPath) => {
      const durationSeconds = probeDuration(clipPath)
      console.log(`[composer] ${path.basename(clipPath)} duration: ${durationSeconds}s`)
      return { path: clipPath, durationSeconds }
    })

    const graph = buildTransitionGraph({
      durations: clips.map((clip) => clip.durationSeconds),
      transitionType,
      transitionDuration,
      resolution: frame
    })
    graph.timing.offsets.forEach((offset, index) => {
      console.log(`[composer] transition ${index + 1}: offset=${offset}s, duration=${transitionDuration}s`)
    })
    console.log(`[composer] expected total duration: ${graph.timing.totalDurationSeconds}s`)

    await render('composition', clipPaths, graph, outputPath)
    logFinalDuration(outputPath)
    return outputPath
  }

  const simpleConcatenate = async ({ clipPaths, outputPath, resolution = DEFAULT_RESOLUTION }: SimpleConcatenateInput) => {
    assertClipsExist(clipPaths, 'concatenate')
    const frame = parseResolution(resolution)
    console.log(`[composer] concatenating ${clipPaths.length} videos without transitions`)
    const graph = buildConcatGraph({ clipCount: clipPaths.length, resolution: frame })
    await render('concatenation', clipPaths, graph, outputPath)
    return outputPath
  }

  return { composeWithTransitions, simpleConcatenate, probeDuration }
}
