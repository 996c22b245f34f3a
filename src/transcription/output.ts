import { promises as fs } from 'node:fs'
import path from 'node:path'

import { TranscribeError, wrapError } from './errors.js'
import { transcriptPathFor } from './utils.js'

/** Returns the transcript path for `sourcePath`, or throws when it would be the source itself. */
export function assertTranscriptTarget(sourcePath: string): string {
  const outputPath = transcriptPathFor(sourcePath)
  if (path.resolve(outputPath) === path.resolve(sourcePath)) {
    throw new TranscribeError(
      'WriteError',
      `Refusing to overwrite the input file with its transcript: ${sourcePath}`
    )
  }
  return outputPath
}

export async function writeTranscriptFile(sourcePath: string, text: string): Promise<string> {
  const outputPath = assertTranscriptTarget(sourcePath)
  try {
    await fs.writeFile(outputPath, text, 'utf8')
  } catch (error) {
    throw wrapError('WriteError', `Could not write transcript to ${outputPath}`, error)
  }
  return outputPath
}
