import { CommanderError } from 'commander'

import { loadTranscribeConfig } from '../config.js'
import { TranscribeError } from '../transcription/errors.js'
import { type MediaTools, transcribeAudioFile } from '../transcription/pipeline.js'
import type { TranscriptionProgressEvent } from '../transcription/types.js'
import { formatSeconds } from '../transcription/utils.js'
import { formatVersionLine } from '../version.js'
import { buildProgram, type ProgramOptions, USAGE_LINE } from './help.js'
import { writeVerbose } from './logging.js'
import { resolveTranscriptionRequest } from './request.js'
import { supportsColor } from './terminal.js'

export type RunEnv = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
  media?: MediaTools
  tempRoot?: string
}

export function formatProgressLine(event: TranscriptionProgressEvent): string | null {
  if (event.partIndex === null || event.parts === null) {
    if (event.processedDurationSeconds === 0 && event.totalDurationSeconds !== null) {
      return `Audio duration: ${formatSeconds(event.totalDurationSeconds)} seconds`
    }
    return null
  }
  if (
    event.totalDurationSeconds !== null &&
    event.processedDurationSeconds === event.totalDurationSeconds
  ) {
    return null
  }
  return `Transcribing chunk ${event.partIndex}/${event.parts}…`
}

export async function runCli(
  argv: string[],
  { env, fetch, stdout, stderr, cwd, media, tempRoot }: RunEnv
): Promise<void> {
  const program = buildProgram()
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
    // runCliMain reports the failure once.
    outputError() {},
  })
  program.exitOverride()

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.help') return
      throw new TranscribeError('InvalidOption', error.message.replace(/^error:\s*/, ''), {
        cause: error,
      })
    }
    throw error
  }

  const opts = program.opts<ProgramOptions>()
  if (opts.version) {
    stdout.write(`${formatVersionLine()}\n`)
    return
  }

  const filePath = program.args[0]
  if (!filePath) {
    throw new Error(USAGE_LINE)
  }

  const verbose = Boolean(opts.verbose)
  const verboseColor = supportsColor(stderr, env)
  const log = (message: string) => writeVerbose(stderr, verbose, message, verboseColor)

  const { config, path: configPath } = loadTranscribeConfig({ env })
  if (config) log(`config ${configPath ?? ''}`)

  const request = resolveTranscriptionRequest({
    filePath,
    model: opts.model ?? null,
    chunkLength: opts.chunkLength ?? null,
    keepChunks: opts.keepChunks ?? null,
    cwd,
    config,
  })
  log(
    `request file=${request.filePath} model=${request.model} ` +
      `chunkLength=${request.chunkLengthSeconds}s keepChunks=${request.keepChunks}`
  )

  const result = await transcribeAudioFile(request, {
    env,
    fetchImpl: fetch,
    media,
    tempRoot,
    log,
    onProgress: (event) => {
      const line = formatProgressLine(event)
      if (line) stderr.write(`${line}\n`)
    },
  })

  stdout.write(`${result.transcript}\n`)
  if (result.keptChunksDir) {
    stderr.write(`Audio chunks and individual transcriptions saved to: ${result.keptChunksDir}\n`)
  }
  stderr.write(`Transcription saved to ${result.outputPath}\n`)
}
