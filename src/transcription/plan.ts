import { MAX_DIRECT_DURATION_SECONDS } from './constants.js'
import { TranscribeError } from './errors.js'
import type { ChunkWindow } from './types.js'

export function shouldSplit(
  durationSeconds: number,
  ceilingSeconds: number = MAX_DIRECT_DURATION_SECONDS
): boolean {
  return durationSeconds > ceilingSeconds
}

export function assertPlayableDuration(durationSeconds: number): void {
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new TranscribeError(
      'InvalidInput',
      `Audio has no playable duration (${durationSeconds} seconds); the file is empty or silent.`
    )
  }
}

/**
 * Fixed-length windows `[iL, min((i+1)L, D))` covering the whole timeline; only the last one
 * can be shorter than `chunkLengthSeconds`.
 */
export function planChunks(durationSeconds: number, chunkLengthSeconds: number): ChunkWindow[] {
  assertPlayableDuration(durationSeconds)
  if (!Number.isInteger(chunkLengthSeconds) || chunkLengthSeconds <= 0) {
    throw new TranscribeError(
      'InvalidOption',
      `Chunk length must be a positive integer number of seconds (got ${chunkLengthSeconds}).`
    )
  }

  const count = Math.ceil(durationSeconds / chunkLengthSeconds)
  const windows: ChunkWindow[] = []
  for (let index = 0; index < count; index += 1) {
    const startSeconds = index * chunkLengthSeconds
    windows.push({
      index,
      startSeconds,
      endSeconds: Math.min(startSeconds + chunkLengthSeconds, durationSeconds),
    })
  }
  return windows
}

export function windowLengthSeconds(window: ChunkWindow): number {
  return window.endSeconds - window.startSeconds
}
