import fs from 'fs'
import path from 'path'
import { once } from 'events'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import axios, { AxiosInstance } from 'axios'
import {
  CatalogResult,
  ICatalogPackage,
  IRawCatalogPackage,
  IRawCatalogVersion
} from '../../shared/types'
import { ModManagerError, errorMessage } from '../errors'

export const DEFAULT_CATALOG_URL = 'https://thunderstore.io'
export const DEFAULT_COMMUNITY = 'riskofrain2'
export const USER_AGENT = 'modkeeper/1.0.0'

export type DownloadProgress = (downloaded: number, total: number) => void

export interface ICatalogClientOptions {
  baseUrl?: string
  community?: string
  timeoutMs?: number
  http?: AxiosInstance
}

function describeRequestError(e: unknown): string {
  if (axios.isAxiosError(e)) {
    if (e.response) return `HTTP Error ${e.response.status}: ${e.response.statusText}`
    if (e.code === 'ECONNABORTED') return 'Connection timed out'
    return `Connection failed: ${e.message}`
  }
  return `Unexpected error: ${errorMessage(e)}`
}

export class CatalogClient {
  private http: AxiosInstance
  private packagesUrl: string

  constructor(options: ICatalogClientOptions = {}) {
    const baseUrl = (options.baseUrl || DEFAULT_CATALOG_URL).replace(/\/+$/, '')
    const community = options.community || DEFAULT_COMMUNITY
    this.packagesUrl = `${baseUrl}/c/${community}/api/v1/package/`
    this.http =
      options.http ||
      axios.create({
        timeout: options.timeoutMs ?? 30_000,
        headers: { 'User-Agent': USER_AGENT }
      })
  }

  async fetchAll(): Promise<CatalogResult<IRawCatalogPackage[]>> {
    try {
      console.log(`[Catalog] Fetching packages from ${this.packagesUrl}`)
      const response = await this.http.get<unknown>(this.packagesUrl)
      const data = response.data
      if (!Array.isArray(data)) {
        console.error('[Catalog] Unexpected response: expected a list of packages')
        return { success: false, error: 'Failed to parse API response: expected a list of packages' }
      }
      const packages = data.filter(isRawRecord)
      console.log(`[Catalog] Fetched ${packages.length} packages`)
      return { success: true, data: packages }
    } catch (e) {
      const error = describeRequestError(e)
      console.error(`[Catalog] ${error}`)
      return { success: false, error }
    }
  }

  async download(
    pkg: ICatalogPackage,
    destDir: string,
    onProgress?: DownloadProgress
  ): Promise<CatalogResult<string>> {
    if (!pkg.downloadUrl) {
      throw new ModManagerError('NetworkFailure', `No download URL available for ${pkg.fullName}`)
    }

    const filePath = path.join(destDir, `${pkg.fullName}-${pkg.version}.zip`)
    let writer: fs.WriteStream | undefined
    try {
      fs.mkdirSync(destDir, { recursive: true })
      console.log(`[Catalog] Downloading ${pkg.fullName} to ${filePath}`)

      const response = await this.http.get<Readable>(pkg.downloadUrl, {
        responseType: 'stream',
        timeout: 60_000
      })
      const total = Number(response.headers['content-length']) || 0
      let downloaded = 0

      response.data.on('data', (chunk: Buffer) => {
        downloaded += chunk.length
        if (onProgress && total) onProgress(downloaded, total)
      })

      writer = fs.createWriteStream(filePath)
      await pipeline(response.data, writer)

      console.log(`[Catalog] Download complete: ${filePath}`)
      return { success: true, data: filePath }
    } catch (e) {
      const error = `Download failed: ${describeRequestError(e)}`
      console.error(`[Catalog] ${error}`)
      if (writer) {
        if (!writer.closed) await once(writer, 'close')
        fs.rmSync(filePath, { force: true })
      }
      return { success: false, error }
    }
  }
}

function asString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback
}

function asNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0
}

function asStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

// Records come straight off the wire; fields are checked one by one when read
function isRawRecord(value: unknown): value is IRawCatalogPackage & IRawCatalogVersion {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function latestVersion(data: IRawCatalogPackage): IRawCatalogVersion | null {
  if (!Array.isArray(data.versions) || data.versions.length === 0) return null
  const latest: unknown = data.versions[0]
  return isRawRecord(latest) ? latest : null
}

// The API lists versions newest first
export function parsePackage(data: IRawCatalogPackage): ICatalogPackage | null {
  const latest = latestVersion(data)
  if (!latest) return null

  return {
    name: asString(data.name, 'Unknown'),
    fullName: asString(data.full_name, ''),
    owner: asString(data.owner, ''),
    description: asString(latest.description, ''),
    version: asString(latest.version_number, '0.0.0'),
    downloadUrl: asString(latest.download_url, ''),
    downloads: asNumber(latest.downloads),
    rating: asNumber(data.rating_score),
    categories: asStringList(data.categories),
    dependencies: asStringList(latest.dependencies),
    dateUpdated: asString(data.date_updated, ''),
    isDeprecated: data.is_deprecated === true
  }
}

function activePackages(packages: IRawCatalogPackage[]): ICatalogPackage[] {
  const parsed: ICatalogPackage[] = []
  for (const data of packages) {
    const pkg = parsePackage(data)
    if (pkg && !pkg.isDeprecated) parsed.push(pkg)
  }
  return parsed
}

export function searchPackages(
  packages: IRawCatalogPackage[],
  query: string,
  limit: number = 20
): ICatalogPackage[] {
  if (!query) return []

  const q = query.toLowerCase()
  const results: ICatalogPackage[] = []
  for (const data of packages) {
    if (results.length >= limit) break

    const name = asString(data.name, '').toLowerCase()
    const fullName = asString(data.full_name, '').toLowerCase()
    const description = asString(latestVersion(data)?.description, '').toLowerCase()

    if (name.includes(q) || fullName.includes(q) || description.includes(q)) {
      const pkg = parsePackage(data)
      if (pkg && !pkg.isDeprecated) results.push(pkg)
    }
  }
  return results
}

export function getPopularPackages(
  packages: IRawCatalogPackage[],
  limit: number = 20
): ICatalogPackage[] {
  return activePackages(packages)
    .sort((a, b) => b.downloads - a.downloads)
    .slice(0, limit)
}

export function getRecentlyUpdated(
  packages: IRawCatalogPackage[],
  limit: number = 20
): ICatalogPackage[] {
  // ISO-8601 timestamps sort lexically
  return activePackages(packages)
    .sort((a, b) => (a.dateUpdated < b.dateUpdated ? 1 : a.dateUpdated > b.dateUpdated ? -1 : 0))
    .slice(0, limit)
}

export function getPackageByName(
  packages: IRawCatalogPackage[],
  fullName: string
): ICatalogPackage | null {
  const wanted = fullName.toLowerCase()
  const data = packages.find((p) => asString(p.full_name, '').toLowerCase() === wanted)
  return data ? parsePackage(data) : null
}
