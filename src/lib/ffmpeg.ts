import { spawn, spawnSync } from 'child_process'
import { getErrnoCode } from './errors'

const windowsAbsolutePathPattern = /^[a-zA-Z]:\\/
const MEDIA_TOOL_LOG_LIMIT = 10_000_000

export type MediaToolRunResult = {
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
}

export type MediaToolRunOptions = {
  timeoutMs?: number
}

// ffmpeg behind a seam so the composer can be driven without a real binary.
// `runSync` throws the spawn error (ENOENT etc.); `run` rejects with it.
export type MediaToolRunner = {
  run: (binaryPath: string, args: string[], options?: MediaToolRunOptions) => Promise<MediaToolRunResult>
  runSync: (binaryPath: string, args: string[], options?: MediaToolRunOptions) => MediaToolRunResult
}

export const resolveBinaryPath = (configuredPath: string | undefined, fallback: string, label: string) => {
  const value = String(configuredPath || '').trim()
  if (!value) return fallback

  if (process.platform !== 'win32' && windowsAbsolutePathPattern.test(value)) {
    console.warn(`[startup] ${label} path looks Windows-specific on ${process.platform}; using ${fallback}`)
    return fallback
  }

  return value
}

export const quoteCliArg = (value: string) => {
  if (value === '') return '""'
  if (/[^\w./:\\-]/.test(value)) {
    return `"${value.replace(/"/g, '\\"')}"`
  }
  return value
}

export const formatCommand = (binaryPath: string, args: string[]) => {
  return [quoteCliArg(binaryPath), ...args.map((arg) => quoteCliArg(arg))].join(' ')
}

const runMediaToolProcess = (binaryPath: string, args: string[], options: MediaToolRunOptions = {}) => {
  return new Promise<MediaToolRunResult>((resolve, reject) => {
    const proc = spawn(binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false
    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true
          proc.kill('SIGKILL')
        }, options.timeoutMs)
      : null
    const fail = (err: Error) => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      if (proc.exitCode === null && !proc.killed) proc.kill('SIGKILL')
      reject(err)
    }
    proc.stdout.on('data', (data: Buffer) => {
      if (stdout.length >= MEDIA_TOOL_LOG_LIMIT) return
      stdout += data.toString()
    })
    proc.stderr.on('data', (data: Buffer) => {
      if (stderr.length >= MEDIA_TOOL_LOG_LIMIT) return
      stderr += data.toString()
    })
    proc.stdout.on('error', fail)
    proc.stderr.on('error', fail)
    proc.on('error', fail)
    proc.on('close', (exitCode) => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      resolve({ exitCode, stdout, stderr, timedOut })
    })
  })
}

const runMediaToolSync = (binaryPath: string, args: string[], options: MediaToolRunOptions = {}): MediaToolRunResult => {
  const result = spawnSync(binaryPath, args, {
    encoding: 'utf8',
    timeout: options.timeoutMs,
    windowsHide: true,
    maxBuffer: MEDIA_TOOL_LOG_LIMIT
  })
  const timedOut = getErrnoCode(result.error) === 'ETIMEDOUT'
  if (result.error && !timedOut) throw result.error
  return {
    exitCode: result.status,
    stdout: String(result.stdout || ''),
    stderr: String(result.stderr || ''),
    timedOut
  }
}

export const processMediaToolRunner: MediaToolRunner = {
  run: runMediaToolProcess,
  runSync: runMediaToolSync
}
