import fs from 'fs'
import { errorMessage } from '../errors'

export const CONFIG_EXTENSION = '.cfg'

export function getConfigFiles(configDir: string): string[] {
  if (!fs.existsSync(configDir)) return []
  try {
    return fs
      .readdirSync(configDir, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(CONFIG_EXTENSION))
      .map((e) => e.name)
      .sort()
  } catch (e) {
    console.warn(`[Config] Could not list ${configDir}: ${errorMessage(e)}`)
    return []
  }
}

function isSettingLine(line: string): boolean {
  return line !== '' && !line.startsWith('#') && !line.startsWith('[') && line.includes('=')
}

function splitSetting(line: string): [string, string] {
  const eq = line.indexOf('=')
  return [line.slice(0, eq).trim(), line.slice(eq + 1).trim()]
}

/**
 * Reads the `Key = Value` entries of a BepInEx .cfg file. Sections are
 * flattened; a key repeated in two sections keeps the last value.
 */
export function parseConfigFile(configPath: string): Record<string, string> {
  const settings: Record<string, string> = {}
  let content: string
  try {
    content = fs.readFileSync(configPath, 'utf8')
  } catch (e) {
    console.warn(`[Config] Could not read ${configPath}: ${errorMessage(e)}`)
    return settings
  }

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!isSettingLine(line)) continue
    const [key, value] = splitSetting(line)
    if (key) settings[key] = value
  }
  return settings
}

export function saveConfigFile(configPath: string, settings: Record<string, string>): boolean {
  try {
    const content = fs.readFileSync(configPath, 'utf8')
    const eol = content.includes('\r\n') ? '\r\n' : '\n'

    const lines = content.split(/\r?\n/).map((rawLine) => {
      const line = rawLine.trim()
      if (!isSettingLine(line)) return rawLine
      const [key] = splitSetting(line)
      if (!Object.prototype.hasOwnProperty.call(settings, key)) return rawLine
      const indent = rawLine.length - rawLine.trimStart().length
      return `${rawLine.slice(0, indent)}${key} = ${settings[key]}`
    })

    fs.writeFileSync(configPath, lines.join(eol), 'utf8')
    return true
  } catch (e) {
    console.error(`[Config] Failed to save ${configPath}: ${errorMessage(e)}`)
    return false
  }
}
