export type ComposeCliArgs = {
  clipPaths: string[]
  outputPath: string
  concat: boolean
  transitionType: string
  transitionDuration: number
  resolution: string
}

const VALUE_FLAGS = new Set(['--transition', '--duration', '--resolution'])

export const COMPOSE_USAGE = 'Usage: compose <video1> <video2> [video3 ...] <output> [--transition fade] [--duration 0.5] [--resolution 1280x720] [--concat]'

export const parseComposeArgs = (argv: string[]): ComposeCliArgs => {
  const positional: string[] = []
  const values = new Map<string, string>()
  let concat = false

  for (let i = 0; i < argv.length; i += 1) {
    const item = argv[i]
    if (item === '--concat') {
      concat = true
      continue
    }
    if (VALUE_FLAGS.has(item)) {
      const value = String(argv[i + 1] || '').trim()
      if (!value) throw new Error(`Missing value for ${item}`)
      values.set(item, value)
      i += 1
      continue
    }
    if (item.startsWith('--')) throw new Error(`Unknown option ${item}`)
    positional.push(item)
  }

  if (positional.length < 3) throw new Error(COMPOSE_USAGE)

  const transitionDuration = Number(values.get('--duration') ?? '0.5')
  if (!Number.isFinite(transitionDuration) || transitionDuration <= 0) {
    throw new Error(`--duration must be a positive number, got ${values.get('--duration')}`)
  }

  return {
    clipPaths: positional.slice(0, -1),
    outputPath: positional[positional.length - 1],
    concat,
    transitionType: values.get('--transition') ?? 'fade',
    transitionDuration,
    resolution: values.get('--resolution') ?? '1280x720'
  }
}
