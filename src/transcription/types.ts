import type { TranscriptionModel } from './constants.js'

export type TranscriptionRequest = Readonly<{
  /** Absolute path of the source audio file. */
  filePath: string
  model: TranscriptionModel
  chunkLengthSeconds: number
  keepChunks: boolean
}>

export type ChunkWindow = {
  /** 0-based position in the plan. */
  index: number
  startSeconds: number
  endSeconds: number
}

export type ChunkArtifact = {
  index: number
  window: ChunkWindow
  path: string
}

export type TranscriptionProgressEvent = {
  /** 1-based chunk index (only when split via ffmpeg). */
  partIndex: number | null
  /** Total number of chunks (only when split via ffmpeg). */
  parts: number | null
  processedDurationSeconds: number | null
  totalDurationSeconds: number | null
}

export type TranscriptionResult = {
  transcript: string
  outputPath: string
  durationSeconds: number
  /** Empty when the file was sent unmodified. */
  chunks: ChunkArtifact[]
  keptChunksDir: string | null
}
