import path from 'node:path'

import { CHUNK_EXTENSION, MEDIA_TYPES_BY_EXTENSION } from './constants.js'

export function toArrayBuffer(view: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(view.byteLength)
  new Uint8Array(buffer).set(view)
  return buffer
}

export function sourceStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath))
}

/** `<stem>_chunk_001.mp3`: the 1-based index keeps chunk order recoverable from the name. */
export function chunkFileName(sourcePath: string, index: number): string {
  return `${sourceStem(sourcePath)}_chunk_${String(index + 1).padStart(3, '0')}${CHUNK_EXTENSION}`
}

export function chunkTranscriptFileName(chunkPath: string): string {
  return `${sourceStem(chunkPath)}.txt`
}

export function keptChunksDirFor(sourcePath: string): string {
  return path.join(path.dirname(sourcePath), `${sourceStem(sourcePath)}_chunks`)
}

export function transcriptPathFor(sourcePath: string): string {
  return path.join(path.dirname(sourcePath), `${sourceStem(sourcePath)}.txt`)
}

export function mediaTypeForPath(filePath: string): string {
  const ext = path.extname(filePath).slice(1).toLowerCase()
  return MEDIA_TYPES_BY_EXTENSION[ext] ?? 'application/octet-stream'
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB']
  let value = bytes
  let idx = 0
  while (value >= 1024 && idx < units.length - 1) {
    value /= 1024
    idx += 1
  }
  const decimals = value >= 10 || idx === 0 ? 0 : 1
  return `${value.toFixed(decimals)}${units[idx]}`
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(2)
}
