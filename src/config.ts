import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import JSON5 from 'json5'

import { TranscribeError } from './transcription/errors.js'

export type TranscribeConfig = {
  /** One of `whisper-1`, `gpt-4o-mini-transcribe`, `gpt-4o-transcribe`; validated with the CLI flag. */
  model?: string
  chunkLength?: number
  keepChunks?: boolean
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalid(path: string, detail: string): TranscribeError {
  return new TranscribeError('InvalidOption', `Invalid config file ${path}: ${detail}`)
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw invalid(path, `comments are not allowed (found /${next} at ${line}:${col}).`)
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || homedir()
  if (!home) return null
  return join(home, '.chunked-transcribe', 'config.json')
}

export function loadTranscribeConfig({ env }: { env: Record<string, string | undefined> }): {
  config: TranscribeConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  assertNoComments(raw, path)
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw invalid(path, `invalid JSON (${message})`)
  }

  if (!isRecord(parsed)) {
    throw invalid(path, 'expected an object at the top level')
  }

  const config: TranscribeConfig = {}
  if (typeof parsed.model !== 'undefined') {
    if (typeof parsed.model !== 'string') throw invalid(path, '"model" must be a string.')
    config.model = parsed.model
  }
  if (typeof parsed.chunkLength !== 'undefined') {
    if (typeof parsed.chunkLength !== 'number') throw invalid(path, '"chunkLength" must be a number.')
    config.chunkLength = parsed.chunkLength
  }
  if (typeof parsed.keepChunks !== 'undefined') {
    if (typeof parsed.keepChunks !== 'boolean') throw invalid(path, '"keepChunks" must be a boolean.')
    config.keepChunks = parsed.keepChunks
  }

  return { config, path }
}
