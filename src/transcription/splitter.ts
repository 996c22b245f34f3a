import path from 'node:path'

import { TranscribeError } from './errors.js'
import type { SliceAudioArgs } from './ffmpeg.js'
import { windowLengthSeconds } from './plan.js'
import type { ChunkArtifact, ChunkWindow } from './types.js'
import { chunkFileName } from './utils.js'

export type SplitAudioArgs = {
  inputPath: string
  plan: ChunkWindow[]
  outputDir: string
  sliceAudio: (args: SliceAudioArgs) => Promise<void>
  onChunk?: ((artifact: ChunkArtifact, total: number) => void) | null
}

export async function splitAudio({
  inputPath,
  plan,
  outputDir,
  sliceAudio,
  onChunk,
}: SplitAudioArgs): Promise<ChunkArtifact[]> {
  const artifacts: ChunkArtifact[] = []
  for (const window of plan) {
    const outputPath = path.join(outputDir, chunkFileName(inputPath, window.index))
    try {
      await sliceAudio({
        inputPath,
        outputPath,
        startSeconds: window.startSeconds,
        durationSeconds: windowLengthSeconds(window),
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new TranscribeError(
        'SplitError',
        `Failed to create chunk ${window.index + 1}/${plan.length}: ${reason}`,
        { cause: error }
      )
    }
    const artifact: ChunkArtifact = { index: window.index, window, path: outputPath }
    artifacts.push(artifact)
    onChunk?.(artifact, plan.length)
  }
  return artifacts
}
