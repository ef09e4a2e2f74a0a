import {
  IDependencyCheckResult,
  IDependencyDetail,
  IDependencyIdentifier,
  IDependencyTree,
  IInstalledMod,
  IModDescriptor
} from '../shared/types'
import { errorMessage } from './errors'

export const DEFAULT_MAX_DEPTH = 10

/**
 * Parses an "Author-Name-Version" token. The name may itself contain dashes,
 * so only the first and last segments are fixed. `raw` keeps the token as given.
 *
 * @example parseDependencyString('bbepis-BepInExPack-5.4.2100')
 * // { author: 'bbepis', name: 'BepInExPack', version: '5.4.2100', raw: 'bbepis-BepInExPack-5.4.2100' }
 */
export function parseDependencyString(raw: unknown): IDependencyIdentifier | null {
  if (typeof raw !== 'string' || !raw) return null

  const token = raw.trim()
  const parts = token.split('-')
  if (parts.length < 3) return null

  const author = parts[0].trim()
  const version = parts[parts.length - 1].trim()
  const name = parts.slice(1, -1).join('-').trim()
  if (!author || !name || !version) return null

  return { author, name, version, raw }
}

export function buildIdentifierSet(installedMods: IInstalledMod[]): Set<string> {
  const identifiers = new Set<string>()
  for (const mod of installedMods) {
    identifiers.add(mod.folderName.toLowerCase())
    identifiers.add(mod.name.toLowerCase())

    // "Author-ModName" folders also match on the bare mod name
    const dash = mod.folderName.indexOf('-')
    if (dash !== -1) {
      identifiers.add(mod.folderName.slice(dash + 1).toLowerCase())
    }
  }
  return identifiers
}

/**
 * Matches on names only. The version in a dependency token is parsed and
 * reported but never compared, so any installed version satisfies it.
 */
export function checkDependencies(
  mod: Pick<IModDescriptor, 'dependencyIdentifiers'>,
  installedMods: IInstalledMod[]
): IDependencyCheckResult {
  const dependencies = mod.dependencyIdentifiers
  if (dependencies.length === 0) {
    return { satisfied: true, missing: [], found: [], details: [] }
  }

  const identifiers = buildIdentifierSet(installedMods)
  const missing: string[] = []
  const found: string[] = []
  const details: IDependencyDetail[] = []

  for (const dep of dependencies) {
    try {
      const info = parseDependencyString(dep)
      if (!info) {
        details.push({
          dependency: dep,
          status: 'invalid',
          message: 'Could not parse dependency string'
        })
        continue
      }

      const parsed = { author: info.author, name: info.name, version: info.version }
      const bareKey = info.name.toLowerCase()
      const fullKey = `${info.author}-${info.name}`.toLowerCase()

      if (identifiers.has(bareKey) || identifiers.has(fullKey)) {
        found.push(dep)
        details.push({ dependency: dep, status: 'found', parsed })
      } else {
        missing.push(dep)
        details.push({ dependency: dep, status: 'missing', parsed })
      }
    } catch (e) {
      console.error(`[Dependencies] Error checking dependency ${dep}: ${errorMessage(e)}`)
      details.push({ dependency: dep, status: 'error', message: errorMessage(e) })
    }
  }

  return { satisfied: missing.length === 0, missing, found, details }
}

export function findMissingDependencies(allMods: IInstalledMod[]): Record<string, string[]> {
  const missingDeps: Record<string, string[]> = {}

  for (const mod of allMods) {
    try {
      const result = checkDependencies(mod, allMods)
      if (!result.satisfied) {
        missingDeps[mod.name] = result.missing
      }
    } catch (e) {
      console.error(`[Dependencies] Error checking dependencies for ${mod.name}: ${errorMessage(e)}`)
    }
  }

  return missingDeps
}

// Looser than checkDependencies: a folder only has to contain the dependency name
export function findInstalledDependency(
  dep: IDependencyIdentifier,
  allMods: IInstalledMod[]
): IInstalledMod | undefined {
  const depName = dep.name.toLowerCase()
  return allMods.find(
    (m) => m.folderName.toLowerCase().includes(depName) || m.name.toLowerCase() === depName
  )
}

export function buildDependencyTree(
  mod: IInstalledMod,
  allMods: IInstalledMod[],
  maxDepth: number = DEFAULT_MAX_DEPTH
): IDependencyTree {
  // No visited set: a cycle recurses until the depth cap cuts it off
  const visit = (current: IInstalledMod, depth: number): IDependencyTree => {
    if (depth >= maxDepth) {
      return { name: current.name, version: current.version, status: 'truncated', children: [] }
    }

    const children: IDependencyTree[] = []
    for (const dep of current.dependencyIdentifiers) {
      const info = parseDependencyString(dep)
      if (!info) {
        children.push({ name: dep, version: '', status: 'invalid', children: [] })
        continue
      }

      const installed = findInstalledDependency(info, allMods)
      if (installed) {
        const subtree = visit(installed, depth + 1)
        children.push(subtree.status === 'truncated' ? subtree : { ...subtree, status: 'installed' })
      } else {
        children.push({
          name: `${info.author}-${info.name}`,
          version: info.version,
          status: 'missing',
          children: []
        })
      }
    }

    return { name: current.name, version: current.version, status: 'installed', children }
  }

  const root = visit(mod, 0)
  return root.status === 'truncated' ? root : { ...root, status: 'root' }
}
