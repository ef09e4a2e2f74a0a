import fs from 'fs'
import path from 'path'
import { IInstalledMod } from '../shared/types'
import { ModManagerError, isPermissionError } from './errors'
import { MANIFEST_FILE, parseManifest } from './manifest'

export const DISABLED_SUFFIX = '.disabled'

export function isDisabledFolder(folder: string): boolean {
  return folder.endsWith(DISABLED_SUFFIX)
}

export function stripDisabledSuffix(folder: string): string {
  return isDisabledFolder(folder) ? folder.slice(0, -DISABLED_SUFFIX.length) : folder
}

export function scanModsDirectory(pluginsPath: string): IInstalledMod[] {
  if (!fs.existsSync(pluginsPath)) {
    console.warn(`[Scanner] Plugins directory not found: ${pluginsPath}`)
    return []
  }

  if (!fs.statSync(pluginsPath).isDirectory()) {
    throw new ModManagerError('NotADirectory', `Path is not a directory: ${pluginsPath}`)
  }

  let entries: fs.Dirent[]
  try {
    entries = fs.readdirSync(pluginsPath, { withFileTypes: true })
  } catch (e) {
    if (isPermissionError(e)) {
      throw new ModManagerError('AccessDenied', `Permission denied: ${pluginsPath}`, { cause: e })
    }
    throw e
  }

  // readdir order is filesystem dependent; fix it so ties sort the same way every scan
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  const mods: IInstalledMod[] = []
  for (const entry of entries) {
    if (!entry.isDirectory()) continue

    const folderPath = path.join(pluginsPath, entry.name)
    const manifestPath = path.join(folderPath, MANIFEST_FILE)
    if (!fs.existsSync(manifestPath)) {
      console.log(`[Scanner] Skipping ${entry.name}: no ${MANIFEST_FILE}`)
      continue
    }

    const descriptor = parseManifest(manifestPath)
    if (!descriptor) {
      console.warn(`[Scanner] Skipping ${entry.name}: unreadable ${MANIFEST_FILE}`)
      continue
    }

    mods.push({
      ...descriptor,
      folderPath,
      folderName: stripDisabledSuffix(entry.name),
      enabled: !isDisabledFolder(entry.name)
    })
  }

  // Array.prototype.sort is stable, so equal names keep enumeration order
  return mods.sort((a, b) => {
    const an = a.name.toLowerCase()
    const bn = b.name.toLowerCase()
    return an < bn ? -1 : an > bn ? 1 : 0
  })
}

export function filterModsByName(mods: IInstalledMod[], searchTerm: string): IInstalledMod[] {
  if (!searchTerm) return mods
  const term = searchTerm.toLowerCase()
  return mods.filter((m) => m.name.toLowerCase().includes(term))
}
