export const TRANSCRIPTION_MODELS = ['whisper-1', 'gpt-4o-mini-transcribe', 'gpt-4o-transcribe'] as const

export type TranscriptionModel = (typeof TRANSCRIPTION_MODELS)[number]

export const DEFAULT_TRANSCRIPTION_MODEL: TranscriptionModel = 'gpt-4o-transcribe'

/** Longest input (seconds) the API accepts in a single request. */
export const MAX_DIRECT_DURATION_SECONDS = 1500

export const DEFAULT_CHUNK_LENGTH_SECONDS = 1200

export const MAX_OPENAI_UPLOAD_BYTES = 25 * 1024 * 1024

export const TRANSCRIPTION_TIMEOUT_MS = 10 * 60 * 1000

export const MAX_ERROR_DETAIL_CHARS = 200

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1'

export const CHUNK_EXTENSION = '.mp3'

export const MEDIA_TYPES_BY_EXTENSION: Readonly<Record<string, string>> = {
  mp3: 'audio/mpeg',
  mpga: 'audio/mpeg',
  mpeg: 'audio/mpeg',
  mp4: 'audio/mp4',
  m4a: 'audio/mp4',
  wav: 'audio/wav',
  webm: 'audio/webm',
}

export function isTranscriptionModel(value: string): value is TranscriptionModel {
  return TRANSCRIPTION_MODELS.some((model) => model === value)
}
