import { ansi } from './terminal.js'

export function writeVerbose(
  stderr: NodeJS.WritableStream,
  verbose: boolean,
  message: string,
  color: boolean
): void {
  if (!verbose) return
  const prefix = ansi('36', '[transcribe]', color)
  stderr.write(`${prefix} ${message}\n`)
}
