import { loadEnv } from '../src/lib/loadEnv'
import { loadServerConfig } from '../src/lib/env'
import { getErrorMessage } from '../src/lib/errors'
import { parseComposeArgs } from '../src/lib/composeArgs'
import { createVideoComposer } from '../src/services/videoComposer'

;(async () => {
  try {
    loadEnv()
    const args = parseComposeArgs(process.argv.slice(2))
    const composer = createVideoComposer(loadServerConfig())
    const result = args.concat
      ? await composer.simpleConcatenate({
          clipPaths: args.clipPaths,
          outputPath: args.outputPath,
          resolution: args.resolution
        })
      : await composer.composeWithTransitions({
          clipPaths: args.clipPaths,
          outputPath: args.outputPath,
          transitionType: args.transitionType,
          transitionDuration: args.transitionDuration,
          resolution: args.resolution
        })
    console.log(`Success! Composed video saved to: ${result}`)
  } catch (error) {
    console.error(`Error: ${getErrorMessage(error)}`)
    process.exitCode = 1
  }
})()
