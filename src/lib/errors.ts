export type ComposerErrorCode =
  | 'MISSING_BINARY'
  | 'MISSING_INPUT'
  | 'DURATION_UNRESOLVED'
  | 'INVALID_COMPOSITION'
  | 'INSUFFICIENT_CLIPS'
  | 'COMPOSITION_TIMEOUT'
  | 'COMPOSITION_FAILED'
  | 'INTERRUPTED_PIPE'
  | 'GENERATED_VIDEO_NOT_FOUND'

export class ComposerError extends Error {
  code: ComposerErrorCode
  retryable: boolean
  details: Record<string, unknown> | null
  constructor(code: ComposerErrorCode, message: string, details?: Record<string, unknown>, retryable = false) {
    super(message)
    this.name = 'ComposerError'
    this.code = code
    this.retryable = retryable
    this.details = details ?? null
  }
}

export class MissingBinaryError extends ComposerError {
  binaryPath: string
  constructor(binaryPath: string, reason?: string) {
    super(
      'MISSING_BINARY',
      `FFmpeg not found at "${binaryPath}". Install FFmpeg and make sure it is on PATH or set FFMPEG_PATH.`,
      reason ? { reason } : undefined
    )
    this.name = 'MissingBinaryError'
    this.binaryPath = binaryPath
  }
}

export class MissingInputError extends ComposerError {
  filePath: string
  constructor(filePath: string) {
    super('MISSING_INPUT', `Video file not found: ${filePath}`, { path: filePath })
    this.name = 'MissingInputError'
    this.filePath = filePath
  }
}

export class DurationUnresolvedError extends ComposerError {
  reasons: string[]
  constructor(filePath: string, reasons: string[]) {
    super('DURATION_UNRESOLVED', `Could not determine video duration for ${filePath}`, { path: filePath, reasons })
    this.name = 'DurationUnresolvedError'
    this.reasons = reasons
  }
}

export class InvalidCompositionError extends ComposerError {
  constructor(message: string, details?: Record<string, unknown>, code: ComposerErrorCode = 'INVALID_COMPOSITION') {
    super(code, message, details)
    this.name = 'InvalidCompositionError'
  }
}

export class InsufficientClipsError extends InvalidCompositionError {
  constructor(clipCount: number, action = 'compose') {
    super(`Need at least 2 videos to ${action}, got ${clipCount}`, { clipCount }, 'INSUFFICIENT_CLIPS')
    this.name = 'InsufficientClipsError'
  }
}

export class CompositionTimeoutError extends ComposerError {
  constructor(timeoutMs: number, hint = 'Try with shorter clips or simpler transitions.', action = 'composition') {
    super('COMPOSITION_TIMEOUT', `Video ${action} timed out after ${Math.round(timeoutMs / 1000)}s. ${hint}`, { timeoutMs, action })
    this.name = 'CompositionTimeoutError'
  }
}

export class CompositionFailedError extends ComposerError {
  stderr: string
  constructor(message: string, stderr = '', details?: Record<string, unknown>) {
    super('COMPOSITION_FAILED', message, { ...details, stderr })
    this.name = 'CompositionFailedError'
    this.stderr = stderr
  }
}

export class InterruptedPipeError extends ComposerError {
  constructor(cause?: string) {
    super('INTERRUPTED_PIPE', 'FFmpeg process was interrupted. Please try again.', cause ? { cause } : undefined, true)
    this.name = 'InterruptedPipeError'
  }
}

export class GeneratedVideoNotFoundError extends ComposerError {
  reasons: string[]
  constructor(reasons: string[]) {
    super('GENERATED_VIDEO_NOT_FOUND', 'No video file found in generation response', { reasons })
    this.name = 'GeneratedVideoNotFoundError'
    this.reasons = reasons
  }
}

export const isComposerError = (error: unknown): error is ComposerError => error instanceof ComposerError

export const getErrorMessage = (error: unknown) => {
  if (error instanceof Error) return error.message
  return String(error)
}

export const getErrnoCode = (error: unknown) => {
  if (!(error instanceof Error)) return null
  if (!('code' in error)) return null
  return typeof error.code === 'string' ? error.code : null
}
