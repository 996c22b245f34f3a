import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { resolveTranscriptionBaseUrl } from './base-url.js'
import { MAX_DIRECT_DURATION_SECONDS, MAX_OPENAI_UPLOAD_BYTES } from './constants.js'
import { TranscribeError, wrapError } from './errors.js'
import {
  buildSliceArgs,
  isFfmpegAvailable,
  probeDurationSeconds,
  type SliceAudioArgs,
  sliceAudio,
} from './ffmpeg.js'
import { transcribeWithOpenAi } from './openai.js'
import { assertTranscriptTarget, writeTranscriptFile } from './output.js'
import { assertPlayableDuration, planChunks, shouldSplit } from './plan.js'
import { splitAudio } from './splitter.js'
import type {
  ChunkArtifact,
  TranscriptionProgressEvent,
  TranscriptionRequest,
  TranscriptionResult,
} from './types.js'
import {
  chunkTranscriptFileName,
  formatBytes,
  formatSeconds,
  keptChunksDirFor,
  mediaTypeForPath,
  sourceStem,
} from './utils.js'

export type MediaTools = {
  isFfmpegAvailable: () => Promise<boolean>
  probeDurationSeconds: (filePath: string) => Promise<number>
  sliceAudio: (args: SliceAudioArgs) => Promise<void>
}

export const ffmpegMediaTools: MediaTools = {
  isFfmpegAvailable,
  probeDurationSeconds,
  sliceAudio,
}

export type TranscribeAudioFileOptions = {
  env: Record<string, string | undefined>
  fetchImpl: typeof fetch
  media?: MediaTools
  /** Parent of the scratch directory used when chunks are not kept. Defaults to `os.tmpdir()`. */
  tempRoot?: string
  onProgress?: ((event: TranscriptionProgressEvent) => void) | null
  log?: ((message: string) => void) | null
}

export async function transcribeAudioFile(
  request: TranscriptionRequest,
  {
    env,
    fetchImpl,
    media = ffmpegMediaTools,
    tempRoot,
    onProgress,
    log,
  }: TranscribeAudioFileOptions
): Promise<TranscriptionResult> {
  assertTranscriptTarget(request.filePath)
  const durationSeconds = await media.probeDurationSeconds(request.filePath)
  assertPlayableDuration(durationSeconds)
  log?.(`duration ${formatSeconds(durationSeconds)}s for ${request.filePath}`)
  onProgress?.({
    partIndex: null,
    parts: null,
    processedDurationSeconds: 0,
    totalDurationSeconds: durationSeconds,
  })

  const transcribeUnit = async (unitPath: string): Promise<string> => {
    let bytes: Uint8Array
    try {
      bytes = new Uint8Array(await fs.readFile(unitPath))
    } catch (error) {
      throw wrapError('InvalidInput', `Could not read ${unitPath}`, error)
    }
    if (bytes.byteLength > MAX_OPENAI_UPLOAD_BYTES) {
      log?.(
        `upload ${path.basename(unitPath)} is ${formatBytes(bytes.byteLength)}, above the ${formatBytes(
          MAX_OPENAI_UPLOAD_BYTES
        )} API limit`
      )
    } else {
      log?.(`upload ${path.basename(unitPath)} (${formatBytes(bytes.byteLength)}, ${request.model})`)
    }
    return transcribeWithOpenAi({
      bytes,
      filename: path.basename(unitPath),
      mediaType: mediaTypeForPath(unitPath),
      model: request.model,
      apiKey: env.OPENAI_API_KEY?.trim() || null,
      baseUrl: resolveTranscriptionBaseUrl(env),
      fetchImpl,
    })
  }

  if (!shouldSplit(durationSeconds, MAX_DIRECT_DURATION_SECONDS)) {
    log?.(`within the ${MAX_DIRECT_DURATION_SECONDS}s limit; sending the file unmodified`)
    const transcript = await transcribeUnit(request.filePath)
    onProgress?.({
      partIndex: null,
      parts: null,
      processedDurationSeconds: durationSeconds,
      totalDurationSeconds: durationSeconds,
    })
    const outputPath = await writeTranscriptFile(request.filePath, transcript)
    return { transcript, outputPath, durationSeconds, chunks: [], keptChunksDir: null }
  }

  if (!(await media.isFfmpegAvailable())) {
    throw new TranscribeError(
      'SplitError',
      'ffmpeg is not installed or not in PATH; it is required to split long audio.'
    )
  }

  const plan = planChunks(durationSeconds, request.chunkLengthSeconds)
  log?.(
    `plan ${plan.length} chunks: ${plan
      .map((w) => `${formatSeconds(w.startSeconds)}-${formatSeconds(w.endSeconds)}`)
      .join(', ')}`
  )

  const keptChunksDir = request.keepChunks ? keptChunksDirFor(request.filePath) : null
  const workDir = await createWorkDir(keptChunksDir, sourceStem(request.filePath), tempRoot)
  log?.(`chunk directory ${workDir}`)

  try {
    const chunks = await splitAudio({
      inputPath: request.filePath,
      plan,
      outputDir: workDir,
      sliceAudio: async (args) => {
        log?.(`ffmpeg ${buildSliceArgs(args).join(' ')}`)
        await media.sliceAudio(args)
      },
      onChunk: (artifact, total) =>
        log?.(`created chunk ${artifact.index + 1}/${total}: ${artifact.path}`),
    })

    const fragments: string[] = []
    for (const chunk of chunks) {
      onProgress?.({
        partIndex: chunk.index + 1,
        parts: chunks.length,
        processedDurationSeconds: chunk.window.startSeconds,
        totalDurationSeconds: durationSeconds,
      })
      fragments.push(await transcribeUnit(chunk.path))
    }
    onProgress?.({
      partIndex: chunks.length,
      parts: chunks.length,
      processedDurationSeconds: durationSeconds,
      totalDurationSeconds: durationSeconds,
    })

    if (keptChunksDir) {
      await writeChunkTranscripts(chunks, fragments)
    }

    const transcript = fragments.join(' ')
    const outputPath = await writeTranscriptFile(request.filePath, transcript)
    return { transcript, outputPath, durationSeconds, chunks, keptChunksDir }
  } finally {
    if (!keptChunksDir) {
      await fs.rm(workDir, { recursive: true, force: true })
    }
  }
}

async function createWorkDir(
  keptChunksDir: string | null,
  stem: string,
  tempRoot: string | undefined
): Promise<string> {
  try {
    if (keptChunksDir) {
      await fs.mkdir(keptChunksDir, { recursive: true })
      // Chunks from an earlier run would otherwise mix with this run's numbering.
      const prefix = `${stem}_chunk_`
      for (const entry of await fs.readdir(keptChunksDir)) {
        if (entry.startsWith(prefix)) {
          await fs.rm(path.join(keptChunksDir, entry), { force: true })
        }
      }
      return keptChunksDir
    }
    return await fs.mkdtemp(path.join(tempRoot ?? os.tmpdir(), 'chunked-transcribe-'))
  } catch (error) {
    throw wrapError('SplitError', 'Could not create a directory for audio chunks', error)
  }
}

async function writeChunkTranscripts(chunks: ChunkArtifact[], fragments: string[]): Promise<void> {
  for (const chunk of chunks) {
    const fragment = fragments[chunk.index] ?? ''
    const target = path.join(path.dirname(chunk.path), chunkTranscriptFileName(chunk.path))
    try {
      await fs.writeFile(target, fragment, 'utf8')
    } catch (error) {
      throw wrapError('WriteError', `Could not write chunk transcript ${target}`, error)
    }
  }
}
