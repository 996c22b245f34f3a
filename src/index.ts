export * from './transcription/index.js'
export { resolveTranscriptionRequest } from './run/request.js'
export { runCli } from './run/runner.js'
