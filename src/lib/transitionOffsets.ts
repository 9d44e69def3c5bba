import { InvalidCompositionError } from './errors'

export type OffsetTable = {
  // xfade start time of transition i+1 on the combined timeline
  offsets: number[]
  totalDurationSeconds: number
}

const isPositiveFinite = (value: number) => Number.isFinite(value) && value > 0

export const assertTransitionDuration = (transitionDuration: number) => {
  if (!isPositiveFinite(transitionDuration)) {
    throw new InvalidCompositionError(`Transition duration must be a positive number of seconds, got ${transitionDuration}`, {
      transitionDuration
    })
  }
}

/**
 * Cross-fade offsets for clips played back to back, each overlapping the
 * next by `transitionDuration`. The transition has to be shorter than every
 * clip or the offsets stop increasing.
 */
export const computeTransitionOffsets = (durations: number[], transitionDuration: number): OffsetTable => {
  if (durations.length < 2) {
    throw new InvalidCompositionError(`Need at least 2 clip durations, got ${durations.length}`, {
      clipCount: durations.length
    })
  }
  durations.forEach((duration, index) => {
    if (!isPositiveFinite(duration)) {
      throw new InvalidCompositionError(`Clip ${index + 1} has an invalid duration: ${duration}`, { index, duration })
    }
  })
  assertTransitionDuration(transitionDuration)

  const shortest = Math.min(...durations)
  if (transitionDuration >= shortest) {
    throw new InvalidCompositionError(
      `Transition duration ${transitionDuration}s must be shorter than the shortest clip (${shortest}s)`,
      { transitionDuration, shortestClip: shortest }
    )
  }

  const offsets: number[] = []
  let accumulated = 0
  for (let i = 1; i < durations.length; i += 1) {
    accumulated += durations[i - 1] - transitionDuration
    offsets.push(accumulated)
  }

  return {
    offsets,
    totalDurationSeconds: computeTotalDuration(durations, transitionDuration)
  }
}

export const computeTotalDuration = (durations: number[], transitionDuration: number) => {
  const sum = durations.reduce((acc, value) => acc + value, 0)
  return sum - Math.max(0, durations.length - 1) * transitionDuration
}
