export function isRichTty(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

export function supportsColor(
  stream: NodeJS.WritableStream,
  env: Record<string, string | undefined>
): boolean {
  if (env.NO_COLOR !== undefined) return false
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return true
  if (env.TERM === 'dumb') return false
  return isRichTty(stream)
}

export function ansi(code: string, input: string, enabled: boolean): string {
  if (!enabled) return input
  return `\u001b[${code}m${input}\u001b[0m`
}
