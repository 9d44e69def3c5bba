import { z } from 'zod'
import { GeneratedVideoNotFoundError } from './errors'
import { firstSuccessful, type FallbackStrategy } from './fallback'

// A video reference in a generation response is either an object naming the
// stored file or a bare file name.
const videoRefSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1).optional(), uri: z.string().min(1).optional() }).passthrough()
])

type VideoRef = z.infer<typeof videoRefSchema>

const generatedVideosShape = z.object({
  generated_videos: z.array(z.object({ video: videoRefSchema }).passthrough()).min(1)
}).passthrough()

const videoShape = z.object({ video: videoRefSchema }).passthrough()

const fileShape = z.object({ file: videoRefSchema }).passthrough()

const fromShape = <T>(label: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, pick: (value: T) => VideoRef): FallbackStrategy<unknown, VideoRef> => ({
  label,
  attempt: (response) => {
    const parsed = schema.safeParse(response)
    return parsed.success ? pick(parsed.data) : null
  }
})

const VIDEO_REF_STRATEGIES = [
  fromShape('generated_videos[0].video', generatedVideosShape, (value) => value.generated_videos[0].video),
  fromShape('video', videoShape, (value) => value.video),
  fromShape('file', fileShape, (value) => value.file)
]

const FILE_NAME_STRATEGIES: FallbackStrategy<VideoRef, string>[] = [
  { label: 'name', attempt: (ref) => (typeof ref !== 'string' && ref.name ? ref.name : null) },
  {
    label: 'uri',
    attempt: (ref) => {
      if (typeof ref === 'string' || !ref.uri) return null
      return ref.uri.split('/').filter(Boolean).pop() ?? null
    }
  },
  { label: 'string', attempt: (ref) => (typeof ref === 'string' ? ref : null) }
]

export type GeneratedVideoLocation = {
  fileName: string
  foundIn: string
}

/**
 * Finds the stored video file name in an image-to-video generation response.
 * The provider has returned it under different keys across API versions, so
 * each known shape is tried in order.
 *
 * Nothing in this package calls it: it is the hand-off point for the
 * generation client, which lives outside the composer and downloads the
 * named file before passing clip paths to `composeWithTransitions`.
 */
export const locateGeneratedVideo = (response: unknown): GeneratedVideoLocation => {
  const ref = firstSuccessful(VIDEO_REF_STRATEGIES, response)
  if (!ref.ok) throw new GeneratedVideoNotFoundError(ref.reasons)

  const fileName = firstSuccessful(FILE_NAME_STRATEGIES, ref.value)
  if (!fileName.ok) throw new GeneratedVideoNotFoundError([...ref.reasons, ...fileName.reasons])

  return { fileName: fileName.value, foundIn: ref.label }
}
