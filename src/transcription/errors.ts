export type TranscribeErrorCode =
  | 'FileNotFound'
  | 'InvalidOption'
  | 'InvalidInput'
  | 'ProbeError'
  | 'SplitError'
  | 'TranscriptionAPIError'
  | 'WriteError'

export class TranscribeError extends Error {
  readonly code: TranscribeErrorCode

  constructor(code: TranscribeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'TranscribeError'
    this.code = code
  }
}

export function isTranscribeError(
  error: unknown,
  code?: TranscribeErrorCode
): error is TranscribeError {
  if (!(error instanceof TranscribeError)) return false
  return code === undefined || error.code === code
}

/** Re-throws `error` as a `TranscribeError` of `code`, keeping the original as `cause`. */
export function wrapError(code: TranscribeErrorCode, prefix: string, error: unknown): TranscribeError {
  if (error instanceof TranscribeError) return error
  if (error instanceof Error) {
    return new TranscribeError(code, `${prefix}: ${error.message}`, { cause: error })
  }
  return new TranscribeError(code, `${prefix}: ${String(error)}`)
}
