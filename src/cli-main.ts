import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { runCli } from './run/runner.js'

export type CliMainArgs = {
  argv: string[]
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  exit: (code: number) => void
  setExitCode: (code: number) => void
  cwd?: string
}

export function handlePipeErrors(stream: NodeJS.WritableStream, exit: (code: number) => void) {
  stream.on('error', (error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'EPIPE') {
      exit(0)
      return
    }
    throw error
  })
}

export function parseDotenv(text: string): Record<string, string> {
  const out: Record<string, string> = {}

  for (const rawLine of text.split(/\r?\n/)) {
    const trimmed = rawLine.trim()
    if (!trimmed || trimmed.startsWith('#')) continue

    let line = trimmed
    if (line.startsWith('export ')) line = line.slice('export '.length).trim()

    const equalsIndex = line.indexOf('=')
    if (equalsIndex <= 0) continue

    const key = line.slice(0, equalsIndex).trim()
    if (!key) continue

    let value = line.slice(equalsIndex + 1).trim()

    const quote = value[0]
    const closing = quote === '"' || quote === "'" ? value.indexOf(quote, 1) : -1
    if (closing > 0) {
      value = value.slice(1, closing)
    } else {
      const commentIndex = value.search(/\s+#/)
      if (commentIndex !== -1) value = value.slice(0, commentIndex).trimEnd()
    }

    out[key] = value
  }

  return out
}

async function loadDotenv(cwd: string): Promise<Record<string, string>> {
  try {
    return parseDotenv(await readFile(join(cwd, '.env'), 'utf8'))
  } catch {
    return {}
  }
}

// Only CSI and OSC sequences; enough for one-line error output.
export function stripAnsi(input: string): string {
  return input
    .replace(/\u001b\[[0-9;?]*[A-Za-z]/g, '')
    .replace(/\u001b\][^\u0007\u001b]*(\u0007|\u001b\\)/g, '')
}

function firstLine(message: string): string {
  const line = message.split(/\r?\n/).find((part) => part.trim().length > 0)
  return (line ?? message).trim()
}

export async function runCliMain({
  argv,
  env,
  fetch,
  stdout,
  stderr,
  exit,
  setExitCode,
  cwd = process.cwd(),
}: CliMainArgs): Promise<void> {
  handlePipeErrors(stdout, exit)
  handlePipeErrors(stderr, exit)

  const verbose = argv.includes('--verbose')

  try {
    // Real environment variables win over .env.
    const mergedEnv = { ...(await loadDotenv(cwd)), ...env }
    await runCli(argv, { env: mergedEnv, fetch, stdout, stderr, cwd })
  } catch (error: unknown) {
    if (verbose && error instanceof Error && typeof error.stack === 'string') {
      stderr.write(`${error.stack}\n`)
      const cause = error.cause
      if (cause instanceof Error && typeof cause.stack === 'string') {
        stderr.write(`Caused by: ${cause.stack}\n`)
      }
      setExitCode(1)
      return
    }

    const message = error instanceof Error ? error.message : error ? String(error) : 'Unknown error'
    stderr.write(`Error: ${firstLine(stripAnsi(message))}\n`)
    setExitCode(1)
  }
}
