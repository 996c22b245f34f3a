import { mkdir, mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { beforeEach, describe, expect, it } from 'vitest'

import { formatProgressLine, runCli } from '../src/run/runner.js'
import { collectStream, createFakeMedia, createTranscriptionFetch } from './helpers/fakes.js'

describe('runCli', () => {
  let dir = ''
  let home = ''
  let scratch = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chunked-transcribe-cli-'))
    home = await mkdtemp(join(tmpdir(), 'chunked-transcribe-cli-home-'))
    scratch = await mkdtemp(join(tmpdir(), 'chunked-transcribe-cli-scratch-'))
    await writeFile(join(dir, 'talk.mp3'), new Uint8Array([7, 7, 7]))
  })

  const run = async (argv: string[], durationSeconds: number, failOn: string | null = null) => {
    const stdout = collectStream()
    const stderr = collectStream()
    const { media, slices } = createFakeMedia({ durationSeconds })
    const { fetchImpl, uploads } = createTranscriptionFetch({ failOn })
    const outcome = await runCli(argv, {
      env: { HOME: home, OPENAI_API_KEY: 'test-key' },
      fetch: fetchImpl,
      stdout: stdout.stream,
      stderr: stderr.stream,
      cwd: dir,
      media,
      tempRoot: scratch,
    }).then(
      () => null,
      (error: unknown) => error
    )
    return { outcome, stdout: stdout.read(), stderr: stderr.read(), slices, uploads }
  }

  it('prints the transcript of a short file and saves it beside the input', async () => {
    const result = await run(['talk.mp3'], 10)

    expect(result.outcome).toBeNull()
    expect(result.stdout).toBe('text of talk.mp3\n')
    expect(result.stderr).toBe(
      `Audio duration: 10.00 seconds\nTranscription saved to ${join(dir, 'talk.txt')}\n`
    )
    expect(result.slices).toEqual([])
    await expect(readFile(join(dir, 'talk.txt'), 'utf8')).resolves.toBe('text of talk.mp3')
  })

  it('reports chunk progress for long audio', async () => {
    const result = await run(['talk.mp3'], 2700)

    expect(result.outcome).toBeNull()
    expect(result.stdout).toBe(
      'text of talk_chunk_001.mp3 text of talk_chunk_002.mp3 text of talk_chunk_003.mp3\n'
    )
    expect(result.stderr).toBe(
      [
        'Audio duration: 2700.00 seconds',
        'Transcribing chunk 1/3…',
        'Transcribing chunk 2/3…',
        'Transcribing chunk 3/3…',
        `Transcription saved to ${join(dir, 'talk.txt')}`,
        '',
      ].join('\n')
    )
    await expect(readdir(scratch)).resolves.toEqual([])
  })

  it('honours --chunk-length and --keep-chunks', async () => {
    const result = await run(['talk.mp3', '--chunk-length', '1000', '--keep-chunks'], 1800)

    expect(result.outcome).toBeNull()
    expect(result.slices.map((s) => s.durationSeconds)).toEqual([1000, 800])
    expect(result.stderr).toContain(
      `Audio chunks and individual transcriptions saved to: ${join(dir, 'talk_chunks')}\n`
    )
    expect((await readdir(join(dir, 'talk_chunks'))).sort()).toEqual([
      'talk_chunk_001.mp3',
      'talk_chunk_001.txt',
      'talk_chunk_002.mp3',
      'talk_chunk_002.txt',
    ])
  })

  it('uploads with the selected model', async () => {
    const stdout = collectStream()
    const models: unknown[] = []
    const { media } = createFakeMedia({ durationSeconds: 5 })
    const fetchImpl: typeof fetch = async (_input, init) => {
      const form = init?.body
      if (form instanceof FormData) models.push(form.get('model'))
      return new Response(JSON.stringify({ text: 'ok' }), { status: 200 })
    }

    await runCli(['talk.mp3', '--model', 'whisper-1'], {
      env: { HOME: home, OPENAI_API_KEY: 'test-key' },
      fetch: fetchImpl,
      stdout: stdout.stream,
      stderr: collectStream().stream,
      cwd: dir,
      media,
    })

    expect(models).toEqual(['whisper-1'])
    expect(stdout.read()).toBe('ok\n')
  })

  it('uses defaults from the config file', async () => {
    await mkdir(join(home, '.chunked-transcribe'))
    await writeFile(join(home, '.chunked-transcribe', 'config.json'), '{ chunkLength: 900 }')

    const result = await run(['talk.mp3'], 1800)

    expect(result.slices.map((s) => [s.startSeconds, s.durationSeconds])).toEqual([
      [0, 900],
      [900, 900],
    ])
  })

  it('lets --no-keep-chunks override keepChunks from the config file', async () => {
    await mkdir(join(home, '.chunked-transcribe'))
    await writeFile(join(home, '.chunked-transcribe', 'config.json'), '{ keepChunks: true }')

    const result = await run(['talk.mp3', '--no-keep-chunks'], 1800)

    expect(result.outcome).toBeNull()
    expect(result.slices).toHaveLength(2)
    expect((await readdir(dir)).sort()).toEqual(['talk.mp3', 'talk.txt'])
    await expect(readdir(scratch)).resolves.toEqual([])
  })

  it('aborts without output when a chunk fails', async () => {
    const result = await run(['talk.mp3'], 2700, 'talk_chunk_002.mp3')

    expect(result.outcome).toMatchObject({ code: 'TranscriptionAPIError' })
    expect(result.uploads).toEqual(['talk_chunk_001.mp3', 'talk_chunk_002.mp3'])
    expect(result.stdout).toBe('')
    expect((await readdir(dir)).sort()).toEqual(['talk.mp3'])
  })

  it('rejects a non-numeric chunk length before probing', async () => {
    const result = await run(['talk.mp3', '--chunk-length', 'ten'], 2700)

    expect(result.outcome).toMatchObject({
      code: 'InvalidOption',
      message: 'Unsupported --chunk-length: ten (expected a positive whole number of seconds)',
    })
    expect(result.slices).toEqual([])
  })

  it('formats only the duration and chunk-start events', () => {
    expect(
      formatProgressLine({ partIndex: null, parts: null, processedDurationSeconds: 0, totalDurationSeconds: 61.5 })
    ).toBe('Audio duration: 61.50 seconds')
    expect(
      formatProgressLine({ partIndex: 2, parts: 4, processedDurationSeconds: 1200, totalDurationSeconds: 4000 })
    ).toBe('Transcribing chunk 2/4…')
    expect(
      formatProgressLine({ partIndex: 4, parts: 4, processedDurationSeconds: 4000, totalDurationSeconds: 4000 })
    ).toBeNull()
  })
})
