export { resolveTranscriptionBaseUrl } from './base-url.js'
export {
  DEFAULT_CHUNK_LENGTH_SECONDS,
  DEFAULT_TRANSCRIPTION_MODEL,
  MAX_DIRECT_DURATION_SECONDS,
  TRANSCRIPTION_MODELS,
  type TranscriptionModel,
  isTranscriptionModel,
} from './constants.js'
export { TranscribeError, type TranscribeErrorCode, isTranscribeError } from './errors.js'
export { isFfmpegAvailable, probeDurationSeconds, sliceAudio } from './ffmpeg.js'
export { transcribeWithOpenAi } from './openai.js'
export { writeTranscriptFile } from './output.js'
export { ffmpegMediaTools, type MediaTools, transcribeAudioFile } from './pipeline.js'
export { planChunks, shouldSplit } from './plan.js'
export { splitAudio } from './splitter.js'
export type {
  ChunkArtifact,
  ChunkWindow,
  TranscriptionProgressEvent,
  TranscriptionRequest,
  TranscriptionResult,
} from './types.js'
