import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

export const FALLBACK_VERSION = '0.1.0'

export function resolvePackageVersion(importMetaUrl: string = import.meta.url): string {
  let dir: string
  try {
    dir = path.dirname(fileURLToPath(importMetaUrl))
  } catch {
    dir = process.cwd()
  }

  for (let i = 0; i < 10; i += 1) {
    const candidate = path.join(dir, 'package.json')
    try {
      const raw = fs.readFileSync(candidate, 'utf8')
      const json: unknown = JSON.parse(raw)
      if (typeof json === 'object' && json !== null && 'version' in json) {
        const version = typeof json.version === 'string' ? json.version.trim() : ''
        if (version.length > 0) return version
      }
    } catch {
      // keep walking up
    }

    const parent = path.dirname(dir)
    if (parent === dir) break
    dir = parent
  }

  return FALLBACK_VERSION
}

export function formatVersionLine(): string {
  return `transcribe ${resolvePackageVersion()}`
}
