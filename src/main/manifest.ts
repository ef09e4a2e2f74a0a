import fs from 'fs'
import { IModDescriptor } from '../shared/types'
import { errorMessage } from './errors'

export const MANIFEST_FILE = 'manifest.json'

const DEFAULT_NAME = 'Unknown'
const DEFAULT_VERSION = '0.0.0'
const DEFAULT_DESCRIPTION = 'No description'

const utf8 = new TextDecoder('utf-8', { fatal: true })

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback
}

function readDependencies(value: unknown, manifestPath: string): string[] {
  if (!Array.isArray(value)) return []
  const deps: string[] = []
  for (const dep of value) {
    if (typeof dep === 'string') {
      deps.push(dep)
    } else {
      console.warn(`[Manifest] Ignoring non-string dependency in ${manifestPath}:`, dep)
    }
  }
  return deps
}

/**
 * Reads a mod's manifest.json. A missing file is a normal state for folders that
 * aren't mods, so it returns null quietly; unreadable or malformed files return
 * null too but are logged.
 */
export function parseManifest(manifestPath: string): IModDescriptor | null {
  if (!fs.existsSync(manifestPath)) return null

  let data: unknown
  try {
    // Throws on invalid UTF-8 instead of substituting U+FFFD
    const raw = utf8.decode(fs.readFileSync(manifestPath))
    // Thunderstore packages are often saved with a BOM
    data = JSON.parse(raw.replace(/^\uFEFF/, ''))
  } catch (e) {
    console.error(`[Manifest] Failed to read ${manifestPath}: ${errorMessage(e)}`)
    return null
  }

  if (!isRecord(data)) {
    console.error(`[Manifest] Expected a JSON object in ${manifestPath}`)
    return null
  }

  return {
    name: stringOr(data.name, DEFAULT_NAME),
    version: stringOr(data.version_number, DEFAULT_VERSION),
    description: stringOr(data.description, DEFAULT_DESCRIPTION),
    websiteUrl: stringOr(data.website_url, ''),
    dependencyIdentifiers: readDependencies(data.dependencies, manifestPath)
  }
}
