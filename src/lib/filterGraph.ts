import { InvalidCompositionError } from './errors'
import { computeTransitionOffsets, type OffsetTable } from './transitionOffsets'

export const FINAL_OUTPUT_LABEL = 'outv'
export const DEFAULT_FPS = 30
export const DEFAULT_RESOLUTION = '1280x720'
// xfade transition names are plain identifiers; anything else would splice into the graph
export const TRANSITION_NAME_PATTERN = /^[a-z0-9_]+$/i

export type Resolution = { width: number; height: number }

export type FilterStage = {
  inputs: string[]
  filters: string[]
  output: string
}

export type FilterGraph = {
  stages: FilterStage[]
  outputLabel: string
}

export type TransitionGraphInput = {
  durations: number[]
  transitionType: string
  transitionDuration: number
  resolution: Resolution
  fps?: number
}

export type TransitionGraph = FilterGraph & { timing: OffsetTable }

export type ConcatGraphInput = {
  clipCount: number
  resolution: Resolution
}

export const parseResolution = (value: string): Resolution => {
  const parts = String(value || '').trim().toLowerCase().split('x')
  if (parts.length !== 2 || !parts.every((part) => /^\d+$/.test(part))) {
    throw new InvalidCompositionError(`Resolution must look like 1280x720, got "${value}"`, { resolution: value })
  }
  const [width, height] = parts.map((part) => Number.parseInt(part, 10))
  if (width <= 0 || height <= 0) {
    throw new InvalidCompositionError(`Resolution must be positive, got "${value}"`, { resolution: value })
  }
  return { width, height }
}

// ffmpeg option values; keeps float noise like 15.000000000000002 out of the graph
export const formatSeconds = (value: number) => String(Number(value.toFixed(6)))

const fitToFrame = ({ width, height }: Resolution) => [
  `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
  `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
  'setsar=1'
]

const clipLabel = (index: number) => `v${index}`

export const buildTransitionGraph = (input: TransitionGraphInput): TransitionGraph => {
  const transitionType = String(input.transitionType || '').trim()
  if (!transitionType) {
    throw new InvalidCompositionError('Transition type must not be empty')
  }
  if (!TRANSITION_NAME_PATTERN.test(transitionType)) {
    throw new InvalidCompositionError(`Transition type must be a plain xfade name, got "${transitionType}"`, { transitionType })
  }
  const fps = input.fps ?? DEFAULT_FPS
  const timing = computeTransitionOffsets(input.durations, input.transitionDuration)
  const clipCount = input.durations.length

  // trim to the measured length so a container that over-reports duration
  // cannot shift later offsets; fps keeps xfade frame-aligned
  const normalize: FilterStage[] = input.durations.map((duration, index) => ({
    inputs: [`${index}:v`],
    filters: [`trim=duration=${formatSeconds(duration)}`, ...fitToFrame(input.resolution), `fps=${fps}`],
    output: clipLabel(index)
  }))

  const chain: FilterStage[] = []
  let previous = clipLabel(0)
  for (let i = 1; i < clipCount; i += 1) {
    const output = i < clipCount - 1 ? `v${i}out` : FINAL_OUTPUT_LABEL
    chain.push({
      inputs: [previous, clipLabel(i)],
      filters: [
        `xfade=transition=${transitionType}:duration=${formatSeconds(input.transitionDuration)}:offset=${formatSeconds(timing.offsets[i - 1])}`
      ],
      output
    })
    previous = output
  }

  return { stages: [...normalize, ...chain], outputLabel: FINAL_OUTPUT_LABEL, timing }
}

export const buildConcatGraph = ({ clipCount, resolution }: ConcatGraphInput): FilterGraph => {
  if (!Number.isInteger(clipCount) || clipCount < 2) {
    throw new InvalidCompositionError(`Need at least 2 videos to concatenate, got ${clipCount}`, { clipCount })
  }
  const normalize: FilterStage[] = Array.from({ length: clipCount }, (_, index) => ({
    inputs: [`${index}:v`],
    filters: fitToFrame(resolution),
    output: clipLabel(index)
  }))
  const concat: FilterStage = {
    inputs: normalize.map((stage) => stage.output),
    filters: [`concat=n=${clipCount}:v=1:a=0`],
    output: FINAL_OUTPUT_LABEL
  }
  return { stages: [...normalize, concat], outputLabel: FINAL_OUTPUT_LABEL }
}

export const renderFilterGraph = (graph: FilterGraph) => {
  const seen = new Set<string>()
  for (const stage of graph.stages) {
    if (seen.has(stage.output)) {
      throw new InvalidCompositionError(`Duplicate filter graph node: ${stage.output}`, { node: stage.output })
    }
    seen.add(stage.output)
  }
  const last = graph.stages[graph.stages.length - 1]
  if (!last || last.output !== graph.outputLabel) {
    throw new InvalidCompositionError(`Filter graph must end in [${graph.outputLabel}]`)
  }
  return graph.stages
    .map((stage) => `${stage.inputs.map((label) => `[${label}]`).join('')}${stage.filters.join(',')}[${stage.output}]`)
    .join(';')
}
