import { CatalogResult, IRawCatalogPackage } from '../../shared/types'
import { CatalogClient } from '../utils/catalog'

// Holds the last successful catalog listing so browsing doesn't refetch every time
export class CatalogCache {
  private client: CatalogClient
  private packages: IRawCatalogPackage[] | null = null
  private fetchedAt: number | null = null

  constructor(client: CatalogClient) {
    this.client = client
  }

  get(): IRawCatalogPackage[] | null {
    return this.packages
  }

  getFetchedAt(): number | null {
    return this.fetchedAt
  }

  // A failed refresh keeps whatever was cached before
  async refresh(): Promise<CatalogResult<IRawCatalogPackage[]>> {
    const result = await this.client.fetchAll()
    if (result.success) {
      this.packages = result.data
      this.fetchedAt = Date.now()
    }
    return result
  }

  async ensure(): Promise<CatalogResult<IRawCatalogPackage[]>> {
    if (this.packages) return { success: true, data: this.packages }
    return this.refresh()
  }

  clear() {
    this.packages = null
    this.fetchedAt = null
  }
}
