import path from 'path'
import { EventEmitter } from 'events'
import {
  CatalogResult,
  ICatalogPackage,
  IDependencyCheckResult,
  IDependencyTree,
  IInstalledMod,
  IRawCatalogPackage,
  IToggleResult
} from '../shared/types'
import { ModManagerError, errorMessage } from './errors'
import { scanModsDirectory } from './scanner'
import {
  buildDependencyTree,
  checkDependencies,
  DEFAULT_MAX_DEPTH,
  findMissingDependencies
} from './dependencies'
import { installModFromArchive, toggleMod, uninstallMod } from './lifecycle'
import { SettingsManager } from './settings'
import { CatalogCache } from './features/catalogCache'
import {
  CatalogClient,
  getPackageByName,
  getPopularPackages,
  getRecentlyUpdated,
  searchPackages
} from './utils/catalog'

export interface IDownloadProgressEvent {
  fullName: string
  progress: number
}

export interface ICatalogInstallResult {
  name: string
  archivePath: string
  dependencies: IDependencyCheckResult | null
}

export class ModManager extends EventEmitter {
  private settings: SettingsManager
  private catalog: CatalogClient
  private cache: CatalogCache

  constructor(settings: SettingsManager, catalog?: CatalogClient) {
    super()
    this.settings = settings
    const { catalogBaseUrl, catalogCommunity, requestTimeoutMs } = settings.get()
    this.catalog =
      catalog ||
      new CatalogClient({
        baseUrl: catalogBaseUrl,
        community: catalogCommunity,
        timeoutMs: requestTimeoutMs
      })
    this.cache = new CatalogCache(this.catalog)
  }

  getPluginsPath(): string {
    const { pluginsPath } = this.settings.get()
    if (!pluginsPath) {
      throw new ModManagerError('NotConfigured', 'Plugins path not set. Run `set-path <dir>` first.')
    }
    return pluginsPath
  }

  // --- Installed mods ---

  getMods(): IInstalledMod[] {
    return scanModsDirectory(this.getPluginsPath())
  }

  // Accepts a folder name (with or without the disabled suffix) or a display name
  findMod(query: string, mods: IInstalledMod[] = this.getMods()): IInstalledMod {
    const q = query.toLowerCase()
    const mod =
      mods.find((m) => path.basename(m.folderPath).toLowerCase() === q) ||
      mods.find((m) => m.folderName.toLowerCase() === q) ||
      mods.find((m) => m.name.toLowerCase() === q)
    if (!mod) throw new ModManagerError('NotFound', `No installed mod matches "${query}"`)
    return mod
  }

  toggleMod(query: string): IToggleResult {
    return toggleMod(this.findMod(query).folderPath)
  }

  installFromFile(archivePath: string): string {
    return installModFromArchive(archivePath, this.getPluginsPath())
  }

  uninstallMod(query: string, deleteConfig = false): string {
    const mod = this.findMod(query)
    return uninstallMod(mod.folderPath, deleteConfig, this.settings.getConfigDir() ?? undefined)
  }

  checkMod(query: string): IDependencyCheckResult {
    const mods = this.getMods()
    return checkDependencies(this.findMod(query, mods), mods)
  }

  getMissingDependencies(): Record<string, string[]> {
    return findMissingDependencies(this.getMods())
  }

  getTree(query: string, maxDepth = DEFAULT_MAX_DEPTH): IDependencyTree {
    const mods = this.getMods()
    return buildDependencyTree(this.findMod(query, mods), mods, maxDepth)
  }

  // --- Catalog ---

  async refreshCatalog(): Promise<IRawCatalogPackage[]> {
    return this.unwrap(await this.cache.refresh())
  }

  private async catalogPackages(): Promise<IRawCatalogPackage[]> {
    return this.unwrap(await this.cache.ensure())
  }

  private unwrap(result: CatalogResult<IRawCatalogPackage[]>): IRawCatalogPackage[] {
    if (!result.success) throw new ModManagerError('NetworkFailure', result.error)
    return result.data
  }

  async searchCatalog(query: string, limit?: number): Promise<ICatalogPackage[]> {
    return searchPackages(await this.catalogPackages(), query, limit)
  }

  async popular(limit?: number): Promise<ICatalogPackage[]> {
    return getPopularPackages(await this.catalogPackages(), limit)
  }

  async recent(limit?: number): Promise<ICatalogPackage[]> {
    return getRecentlyUpdated(await this.catalogPackages(), limit)
  }

  async getPackage(fullName: string): Promise<ICatalogPackage> {
    const pkg = getPackageByName(await this.catalogPackages(), fullName)
    if (!pkg) throw new ModManagerError('NotFound', `Package not found in catalog: ${fullName}`)
    return pkg
  }

  async downloadPackage(fullName: string): Promise<string> {
    return this.download(await this.getPackage(fullName))
  }

  private async download(pkg: ICatalogPackage): Promise<string> {
    const result = await this.catalog.download(
      pkg,
      this.settings.getDownloadsDir(),
      (downloaded, total) => {
        const event: IDownloadProgressEvent = {
          fullName: pkg.fullName,
          progress: Math.round((downloaded / total) * 100)
        }
        this.emit('download-progress', event)
      }
    )
    if (!result.success) throw new ModManagerError('NetworkFailure', result.error)
    return result.data
  }

  async installFromCatalog(fullName: string): Promise<ICatalogInstallResult> {
    const pluginsPath = this.getPluginsPath()
    const pkg = await this.getPackage(fullName)
    const archivePath = await this.download(pkg)
    const name = installModFromArchive(archivePath, pluginsPath)

    let dependencies: IDependencyCheckResult | null = null
    try {
      const mods = scanModsDirectory(pluginsPath)
      const folderName = path.parse(archivePath).name
      const installed = mods.find((m) => m.folderName === folderName)
      if (installed) dependencies = checkDependencies(installed, mods)
    } catch (e) {
      console.warn(`[Install] Error checking dependencies: ${errorMessage(e)}`)
    }

    return { name, archivePath, dependencies }
  }
}
