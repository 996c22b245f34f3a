import { mkdir, mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { loadTranscribeConfig } from '../src/config.js'
import { catchError } from './helpers/fakes.js'

async function homeWithConfig(contents: string | null): Promise<string> {
  const home = await mkdtemp(join(tmpdir(), 'chunked-transcribe-home-'))
  if (contents !== null) {
    await mkdir(join(home, '.chunked-transcribe'))
    await writeFile(join(home, '.chunked-transcribe', 'config.json'), contents)
  }
  return home
}

describe('loadTranscribeConfig', () => {
  it('returns null when the file does not exist', async () => {
    const home = await homeWithConfig(null)
    expect(loadTranscribeConfig({ env: { HOME: home } })).toEqual({
      config: null,
      path: join(home, '.chunked-transcribe', 'config.json'),
    })
  })

  it('parses JSON5 with trailing commas and unquoted keys', async () => {
    const home = await homeWithConfig('{ model: "whisper-1", chunkLength: 600, keepChunks: true, }')
    expect(loadTranscribeConfig({ env: { HOME: home } }).config).toEqual({
      model: 'whisper-1',
      chunkLength: 600,
      keepChunks: true,
    })
  })

  it('ignores unknown keys', async () => {
    const home = await homeWithConfig('{"theme": "dark"}')
    expect(loadTranscribeConfig({ env: { HOME: home } }).config).toEqual({})
  })

  it('rejects comments with their position', async () => {
    const home = await homeWithConfig('{\n  // default model\n  "model": "whisper-1"\n}')
    const path = join(home, '.chunked-transcribe', 'config.json')
    expect(() => loadTranscribeConfig({ env: { HOME: home } })).toThrow(
      `Invalid config file ${path}: comments are not allowed (found // at 2:3).`
    )
  })

  it.each([
    { contents: '/* defaults */ {}', position: '/* at 1:1' },
    { contents: '{\n// model\n}', position: '// at 2:1' },
    { contents: '{"model": "x"} // trailing', position: '// at 1:16' },
  ])('reports the comment position in $contents', async ({ contents, position }) => {
    const home = await homeWithConfig(contents)
    const path = join(home, '.chunked-transcribe', 'config.json')
    expect(() => loadTranscribeConfig({ env: { HOME: home } })).toThrow(
      `Invalid config file ${path}: comments are not allowed (found ${position}).`
    )
  })

  it('does not mistake slashes inside strings for comments', async () => {
    const home = await homeWithConfig('{"model": "a//b"}')
    expect(loadTranscribeConfig({ env: { HOME: home } }).config).toEqual({ model: 'a//b' })
  })

  it.each([
    { contents: '[1, 2]', detail: 'expected an object at the top level' },
    { contents: '{"chunkLength": "600"}', detail: '"chunkLength" must be a number.' },
    { contents: '{"keepChunks": "yes"}', detail: '"keepChunks" must be a boolean.' },
    { contents: '{"model": 4}', detail: '"model" must be a string.' },
  ])('rejects $contents', async ({ contents, detail }) => {
    const home = await homeWithConfig(contents)
    const path = join(home, '.chunked-transcribe', 'config.json')
    expect(catchError(() => loadTranscribeConfig({ env: { HOME: home } }))).toMatchObject({
      code: 'InvalidOption',
      message: `Invalid config file ${path}: ${detail}`,
    })
  })

  it('reports malformed JSON', async () => {
    const home = await homeWithConfig('{"model": ')
    expect(() => loadTranscribeConfig({ env: { HOME: home } })).toThrow(/invalid JSON/)
  })
})
