import { Command } from 'commander'

import {
  DEFAULT_CHUNK_LENGTH_SECONDS,
  DEFAULT_TRANSCRIPTION_MODEL,
  MAX_DIRECT_DURATION_SECONDS,
  TRANSCRIPTION_MODELS,
} from '../transcription/constants.js'

export const USAGE_LINE =
  'Usage: transcribe <audio-file> [--model <id>] [--chunk-length <seconds>] [--keep-chunks]'

export type ProgramOptions = {
  model?: string
  chunkLength?: string
  keepChunks?: boolean
  verbose?: boolean
  version?: boolean
}

export function buildProgram(): Command {
  return new Command()
    .name('transcribe')
    .description(
      `Transcribe an audio file with the OpenAI transcription API. Files longer than ${MAX_DIRECT_DURATION_SECONDS}s are split with ffmpeg and the chunk transcripts joined in order.`
    )
    .argument('[audio-file]', 'path to the audio file (mp3, mp4, mpeg, mpga, m4a, wav, webm)')
    .option(
      '--model <id>',
      `transcription model: ${TRANSCRIPTION_MODELS.join(', ')} (default: ${DEFAULT_TRANSCRIPTION_MODEL})`
    )
    .option(
      '--chunk-length <seconds>',
      `length of each chunk for long audio (default: ${DEFAULT_CHUNK_LENGTH_SECONDS})`
    )
    .option('--keep-chunks', 'keep chunk audio and per-chunk transcripts in <name>_chunks/')
    .option('--no-keep-chunks', 'remove chunk audio after the run, overriding the config file')
    .option('--verbose', 'print diagnostics to stderr', false)
    .option('-V, --version', 'print the version and exit')
    .addHelpText(
      'after',
      `
Environment:
  OPENAI_API_KEY            API key (also read from ./.env)
  OPENAI_WHISPER_BASE_URL   override the transcription endpoint base URL
  OPENAI_BASE_URL           fallback base URL (ignored for OpenRouter)

Config:
  ~/.chunked-transcribe/config.json   { "model": "...", "chunkLength": 1200, "keepChunks": false }
`
    )
    .allowExcessArguments(false)
}
