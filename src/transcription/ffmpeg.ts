import { spawn } from 'node:child_process'

import { TranscribeError } from './errors.js'

const MAX_CAPTURED_OUTPUT_CHARS = 8192

export type SliceAudioArgs = {
  inputPath: string
  outputPath: string
  startSeconds: number
  durationSeconds: number
}

export function buildSliceArgs({
  inputPath,
  outputPath,
  startSeconds,
  durationSeconds,
}: SliceAudioArgs): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-ss',
    String(startSeconds),
    '-t',
    String(durationSeconds),
    '-i',
    inputPath,
    '-vn',
    '-ac',
    '1',
    '-ar',
    '16000',
    '-b:a',
    '64k',
    outputPath,
  ]
}

export async function isFfmpegAvailable(): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn('ffmpeg', ['-version'], { stdio: ['ignore', 'ignore', 'ignore'] })
    proc.on('error', () => resolve(false))
    proc.on('close', (code) => resolve(code === 0))
  })
}

export async function probeDurationSeconds(filePath: string): Promise<number> {
  const args = [
    '-v',
    'error',
    '-show_entries',
    'format=duration',
    '-of',
    'default=noprint_wrappers=1:nokey=1',
    filePath,
  ]
  const { code, stdout, stderr } = await runCapture('ffprobe', args).catch((error: unknown) => {
    const reason = error instanceof Error ? error.message : String(error)
    throw new TranscribeError(
      'ProbeError',
      `ffprobe could not be started (${reason}); is ffmpeg installed?`,
      { cause: error }
    )
  })

  if (code !== 0) {
    const detail = stderr.trim()
    throw new TranscribeError(
      'ProbeError',
      `ffprobe failed (${code ?? 'unknown'}) for ${filePath}: ${detail || 'unknown error'}`
    )
  }

  const trimmed = stdout.trim()
  const parsed = trimmed.length > 0 ? Number(trimmed) : Number.NaN
  if (!Number.isFinite(parsed)) {
    throw new TranscribeError(
      'ProbeError',
      `ffprobe returned an unreadable duration for ${filePath}: ${JSON.stringify(trimmed)}`
    )
  }
  return parsed
}

export async function sliceAudio(args: SliceAudioArgs): Promise<void> {
  const { code, stderr } = await runCapture('ffmpeg', buildSliceArgs(args))
  if (code === 0) return
  const detail = stderr.trim()
  throw new Error(`ffmpeg failed (${code ?? 'unknown'}): ${detail || 'unknown error'}`)
}

async function runCapture(
  command: string,
  args: string[]
): Promise<{ code: number | null; stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    proc.stdout?.setEncoding('utf8')
    proc.stdout?.on('data', (chunk: string) => {
      if (stdout.length > MAX_CAPTURED_OUTPUT_CHARS) return
      stdout += chunk
    })
    proc.stderr?.setEncoding('utf8')
    proc.stderr?.on('data', (chunk: string) => {
      if (stderr.length > MAX_CAPTURED_OUTPUT_CHARS) return
      stderr += chunk
    })
    proc.on('error', (error) => reject(error))
    proc.on('close', (code) => resolve({ code, stdout, stderr }))
  })
}
