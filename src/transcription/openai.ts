import { MAX_ERROR_DETAIL_CHARS, TRANSCRIPTION_TIMEOUT_MS, type TranscriptionModel } from './constants.js'
import { TranscribeError, wrapError } from './errors.js'
import { toArrayBuffer } from './utils.js'

export type OpenAiTranscriptionArgs = {
  bytes: Uint8Array
  filename: string
  mediaType: string
  model: TranscriptionModel
  apiKey: string | null
  baseUrl: string
  fetchImpl: typeof fetch
  timeoutMs?: number
}

export async function transcribeWithOpenAi({
  bytes,
  filename,
  mediaType,
  model,
  apiKey,
  baseUrl,
  fetchImpl,
  timeoutMs = TRANSCRIPTION_TIMEOUT_MS,
}: OpenAiTranscriptionArgs): Promise<string> {
  if (!apiKey) {
    throw new TranscribeError(
      'TranscriptionAPIError',
      'OpenAI authentication failed: OPENAI_API_KEY is not set (export it or add it to .env).'
    )
  }

  const form = new FormData()
  form.append('file', new Blob([toArrayBuffer(bytes)], { type: mediaType }), filename)
  form.append('model', model)

  let response: Response
  try {
    response = await fetchImpl(`${baseUrl}/audio/transcriptions`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${apiKey}` },
      body: form,
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    throw wrapError(
      'TranscriptionAPIError',
      `OpenAI transcription request for ${filename} failed`,
      error
    )
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response)
    const suffix = detail ? `: ${detail}` : ''
    throw new TranscribeError(
      'TranscriptionAPIError',
      `OpenAI transcription failed for ${filename} (${response.status})${suffix}`
    )
  }

  let payload: unknown
  try {
    payload = await response.json()
  } catch (error) {
    throw wrapError(
      'TranscriptionAPIError',
      `OpenAI transcription for ${filename} returned invalid JSON`,
      error
    )
  }

  const text = readText(payload)
  if (!text) {
    throw new TranscribeError(
      'TranscriptionAPIError',
      `OpenAI transcription for ${filename} returned empty text`
    )
  }
  return text
}

function readText(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null || !('text' in payload)) return null
  if (typeof payload.text !== 'string') return null
  const trimmed = payload.text.trim()
  return trimmed.length > 0 ? trimmed : null
}

async function readErrorDetail(response: Response): Promise<string | null> {
  try {
    const text = await response.text()
    const trimmed = text.trim()
    if (!trimmed) return null
    return trimmed.length > MAX_ERROR_DETAIL_CHARS
      ? `${trimmed.slice(0, MAX_ERROR_DETAIL_CHARS)}…`
      : trimmed
  } catch {
    return null
  }
}
