import { DEFAULT_OPENAI_BASE_URL } from './constants.js'

type Env = Record<string, string | undefined>

export function normalizeBaseUrl(raw: string | null | undefined): string | null {
  const trimmed = typeof raw === 'string' ? raw.trim() : ''
  return trimmed.length > 0 ? trimmed.replace(/\/+$/, '') : null
}

export function isOpenRouterBaseUrl(baseUrl: string): boolean {
  try {
    return new URL(baseUrl).host.toLowerCase().includes('openrouter.ai')
  } catch {
    return /openrouter\.ai/i.test(baseUrl)
  }
}

/**
 * `OPENAI_WHISPER_BASE_URL` wins over `OPENAI_BASE_URL`. OpenRouter exposes no
 * `/audio/transcriptions`, so a base URL pointing there falls back to OpenAI.
 */
export function resolveTranscriptionBaseUrl(env: Env): string {
  const whisperBaseUrl = normalizeBaseUrl(env.OPENAI_WHISPER_BASE_URL)
  if (whisperBaseUrl) return whisperBaseUrl

  const openaiBaseUrl = normalizeBaseUrl(env.OPENAI_BASE_URL)
  if (openaiBaseUrl && !isOpenRouterBaseUrl(openaiBaseUrl)) return openaiBaseUrl

  return DEFAULT_OPENAI_BASE_URL
}
