import os from 'os'
import path from 'path'
import fs from 'fs'
import { IAppSettings } from '../shared/types'
import { DEFAULT_CATALOG_URL, DEFAULT_COMMUNITY } from './utils/catalog'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Stored values of the wrong type are dropped so the defaults apply
function readStoredSettings(data: Record<string, unknown>): Partial<IAppSettings> {
  const stored: Partial<IAppSettings> = {}
  const str = (value: unknown) => (typeof value === 'string' ? value : undefined)

  const pluginsPath = str(data.pluginsPath)
  if (pluginsPath !== undefined) stored.pluginsPath = pluginsPath
  const configPath = str(data.configPath)
  if (configPath !== undefined) stored.configPath = configPath
  const downloadsPath = str(data.downloadsPath)
  if (downloadsPath !== undefined) stored.downloadsPath = downloadsPath
  const catalogBaseUrl = str(data.catalogBaseUrl)
  if (catalogBaseUrl !== undefined) stored.catalogBaseUrl = catalogBaseUrl
  const catalogCommunity = str(data.catalogCommunity)
  if (catalogCommunity !== undefined) stored.catalogCommunity = catalogCommunity

  const timeout = data.requestTimeoutMs
  if (typeof timeout === 'number' && Number.isFinite(timeout) && timeout > 0) {
    stored.requestTimeoutMs = timeout
  }
  return stored
}

export function defaultDataDir(): string {
  return process.env['MODKEEPER_HOME'] || path.join(os.homedir(), '.modkeeper')
}

export class SettingsManager {
  private dataDir: string
  private settingsPath: string
  private settings: IAppSettings

  private defaultSettings: IAppSettings = {
    pluginsPath: '',
    catalogBaseUrl: DEFAULT_CATALOG_URL,
    catalogCommunity: DEFAULT_COMMUNITY,
    requestTimeoutMs: 30_000
  }

  constructor(dataDir: string = defaultDataDir()) {
    this.dataDir = dataDir
    this.settingsPath = path.join(dataDir, 'settings.json')
    this.settings = this.load()
  }

  private load(): IAppSettings {
    if (!fs.existsSync(this.settingsPath)) {
      return { ...this.defaultSettings }
    }
    try {
      const data: unknown = JSON.parse(fs.readFileSync(this.settingsPath, 'utf8'))
      if (!isRecord(data)) {
        console.warn(`[Settings] Ignoring ${this.settingsPath}: expected a JSON object`)
        return { ...this.defaultSettings }
      }
      return { ...this.defaultSettings, ...readStoredSettings(data) }
    } catch (e) {
      console.warn(`[Settings] Ignoring unreadable ${this.settingsPath}:`, e)
      return { ...this.defaultSettings }
    }
  }

  private save(settings: IAppSettings) {
    fs.mkdirSync(this.dataDir, { recursive: true })
    fs.writeFileSync(this.settingsPath, JSON.stringify(settings, null, 2))
  }

  get(): IAppSettings {
    return this.settings
  }

  set(newSettings: Partial<IAppSettings>) {
    this.settings = { ...this.settings, ...newSettings }
    this.save(this.settings)
    return this.settings
  }

  // BepInEx keeps configs beside plugins: BepInEx/plugins -> BepInEx/config
  getConfigDir(): string | null {
    const { configPath, pluginsPath } = this.settings
    if (configPath) return configPath
    if (!pluginsPath) return null
    return path.join(path.dirname(pluginsPath), 'config')
  }

  getDownloadsDir(): string {
    const dir = this.settings.downloadsPath || path.join(this.dataDir, 'downloads')
    fs.mkdirSync(dir, { recursive: true })
    return dir
  }
}
