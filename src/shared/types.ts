export interface IModDescriptor {
  name: string
  version: string
  description: string
  websiteUrl: string
  dependencyIdentifiers: string[] // Raw "Author-Name-Version" tokens, declared order
}

export interface IInstalledMod extends IModDescriptor {
  folderPath: string
  folderName: string // Without the disabled suffix
  enabled: boolean
}

export interface IDependencyIdentifier {
  author: string
  name: string
  version: string
  raw: string
}

export type DependencyStatus = 'found' | 'missing' | 'invalid' | 'error'

export interface IDependencyDetail {
  dependency: string
  status: DependencyStatus
  parsed?: Pick<IDependencyIdentifier, 'author' | 'name' | 'version'>
  message?: string
}

export interface IDependencyCheckResult {
  satisfied: boolean
  missing: string[]
  found: string[]
  details: IDependencyDetail[]
}

export type DependencyTreeStatus = 'root' | 'installed' | 'missing' | 'invalid' | 'truncated'

export interface IDependencyTree {
  name: string
  version: string
  status: DependencyTreeStatus
  children: IDependencyTree[]
}

export interface IToggleResult {
  success: boolean
  enabled: boolean
  path: string
}

// Shape of a package as returned by the catalog API. Everything is optional: the
// API is not ours and records are validated field by field in parsePackage.
export interface IRawCatalogVersion {
  description?: unknown
  version_number?: unknown
  download_url?: unknown
  downloads?: unknown
  dependencies?: unknown
}

export interface IRawCatalogPackage {
  name?: unknown
  full_name?: unknown
  owner?: unknown
  rating_score?: unknown
  categories?: unknown
  date_updated?: unknown
  is_deprecated?: unknown
  versions?: unknown
}

export interface ICatalogPackage {
  name: string
  fullName: string // Owner-Name
  owner: string
  description: string
  version: string
  downloadUrl: string
  downloads: number
  rating: number
  categories: string[]
  dependencies: string[]
  dateUpdated: string
  isDeprecated: boolean
}

export type CatalogResult<T> = { success: true; data: T } | { success: false; error: string }

export interface IAppSettings {
  pluginsPath: string
  configPath?: string // Defaults to <pluginsPath>/../config
  downloadsPath?: string
  catalogBaseUrl: string
  catalogCommunity: string
  requestTimeoutMs: number
}
