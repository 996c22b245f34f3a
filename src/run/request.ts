import { statSync } from 'node:fs'
import path from 'node:path'

import type { TranscribeConfig } from '../config.js'
import {
  DEFAULT_CHUNK_LENGTH_SECONDS,
  DEFAULT_TRANSCRIPTION_MODEL,
  TRANSCRIPTION_MODELS,
  isTranscriptionModel,
} from '../transcription/constants.js'
import { TranscribeError } from '../transcription/errors.js'
import type { TranscriptionRequest } from '../transcription/types.js'

export type RawTranscriptionOptions = {
  filePath: string
  model?: string | null
  chunkLength?: string | number | null
  keepChunks?: boolean | null
  cwd?: string
  config?: TranscribeConfig | null
}

export function parseChunkLengthArg(raw: string | number): number {
  const value =
    typeof raw === 'number' ? raw : /^\s*\d+\s*$/.test(raw) ? Number(raw.trim()) : Number.NaN
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new TranscribeError(
      'InvalidOption',
      `Unsupported --chunk-length: ${String(raw)} (expected a positive whole number of seconds)`
    )
  }
  return value
}

export function parseModelArg(raw: string): TranscriptionRequest['model'] {
  const normalized = raw.trim()
  if (isTranscriptionModel(normalized)) return normalized
  throw new TranscribeError(
    'InvalidOption',
    `Unsupported --model: ${raw} (expected one of ${TRANSCRIPTION_MODELS.join(', ')})`
  )
}

function assertRegularFile(filePath: string): void {
  let isFile = false
  try {
    isFile = statSync(filePath).isFile()
  } catch {
    isFile = false
  }
  if (!isFile) {
    throw new TranscribeError('FileNotFound', `Audio file not found: ${filePath}`)
  }
}

/** CLI values win over the config file, which wins over the built-in defaults. */
export function resolveTranscriptionRequest({
  filePath,
  model,
  chunkLength,
  keepChunks,
  cwd = process.cwd(),
  config,
}: RawTranscriptionOptions): TranscriptionRequest {
  const absolutePath = path.resolve(cwd, filePath)
  assertRegularFile(absolutePath)

  const modelRaw = model ?? config?.model ?? null
  const chunkLengthRaw = chunkLength ?? config?.chunkLength ?? null

  return Object.freeze({
    filePath: absolutePath,
    model: modelRaw === null ? DEFAULT_TRANSCRIPTION_MODEL : parseModelArg(modelRaw),
    chunkLengthSeconds:
      chunkLengthRaw === null ? DEFAULT_CHUNK_LENGTH_SECONDS : parseChunkLengthArg(chunkLengthRaw),
    keepChunks: keepChunks ?? config?.keepChunks ?? false,
  })
}
