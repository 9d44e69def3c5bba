import fs from 'fs'
import path from 'path'

export const MP4_FAMILY_EXTENSIONS = new Set(['.mp4', '.m4v', '.mov'])

const BOX_HEADER_SIZE = 8
const LARGE_BOX_HEADER_SIZE = 16

export type MovieHeader = {
  version: number
  timescale: number
  duration: number
}

export const isMp4Family = (filePath: string) => MP4_FAMILY_EXTENSIONS.has(path.extname(filePath).toLowerCase())

/**
 * Walks ISO-BMFF boxes in `data` and returns the payload of the first box
 * tagged `target`, descending into `moov`. Size 1 means a 64-bit size
 * follows the tag; size 0 means the box runs to the end of `data`.
 */
export const findAtom = (data: Buffer, target: string): Buffer | null => {
  let offset = 0
  const total = data.length

  while (offset + BOX_HEADER_SIZE <= total) {
    let size = data.readUInt32BE(offset)
    const type = data.toString('latin1', offset + 4, offset + 8)
    let headerSize = BOX_HEADER_SIZE

    if (size === 1) {
      if (offset + LARGE_BOX_HEADER_SIZE > total) return null
      const large = data.readBigUInt64BE(offset + 8)
      if (large > BigInt(total - offset)) return null
      size = Number(large)
      headerSize = LARGE_BOX_HEADER_SIZE
    } else if (size === 0) {
      size = total - offset
    }

    // truncated or corrupt box, nothing after it can be trusted
    if (size < headerSize || offset + size > total) return null

    if (type === target) return data.subarray(offset + headerSize, offset + size)

    if (type === 'moov') {
      const nested = findAtom(data.subarray(offset + headerSize, offset + size), target)
      if (nested) return nested
    }

    offset += size
  }

  return null
}

export const parseMovieHeader = (chunk: Buffer): MovieHeader | null => {
  if (chunk.length === 0) return null
  const version = chunk[0]

  if (version === 1) {
    if (chunk.length < 32) return null
    return {
      version,
      timescale: chunk.readUInt32BE(20),
      duration: Number(chunk.readBigUInt64BE(24))
    }
  }

  if (chunk.length < 20) return null
  return {
    version,
    timescale: chunk.readUInt32BE(12),
    duration: chunk.readUInt32BE(16)
  }
}

export const movieHeaderSeconds = (header: MovieHeader) => {
  if (header.timescale === 0) return null
  return header.duration / header.timescale
}

// null for anything that is not an MP4/MOV with a readable mvhd
export const readMp4Duration = (filePath: string) => {
  if (!isMp4Family(filePath)) return null
  const data = fs.readFileSync(filePath)
  const chunk = findAtom(data, 'mvhd')
  if (!chunk) return null
  const header = parseMovieHeader(chunk)
  return header ? movieHeaderSeconds(header) : null
}
