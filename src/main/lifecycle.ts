import fs from 'fs'
import path from 'path'
import { IToggleResult } from '../shared/types'
import { ModManagerError, errorMessage, isPermissionError } from './errors'
import { MANIFEST_FILE, parseManifest } from './manifest'
import { DISABLED_SUFFIX, isDisabledFolder, stripDisabledSuffix } from './scanner'
import { extractArchive, findArchiveEntry, openArchive } from './utils/archives'
import { getConfigFiles } from './features/configEditor'

export function toggleMod(modPath: string): IToggleResult {
  if (!fs.existsSync(modPath)) {
    throw new ModManagerError('NotFound', `Mod folder not found: ${modPath}`)
  }

  const folder = path.basename(modPath)
  const wasEnabled = !isDisabledFolder(folder)
  const target = path.join(
    path.dirname(modPath),
    wasEnabled ? folder + DISABLED_SUFFIX : stripDisabledSuffix(folder)
  )

  if (fs.existsSync(target)) {
    console.error(`[Toggle] Cannot ${wasEnabled ? 'disable' : 'enable'}: ${target} already exists`)
    return { success: false, enabled: wasEnabled, path: modPath }
  }

  try {
    fs.renameSync(modPath, target)
  } catch (e) {
    const reason = isPermissionError(e) ? 'Permission denied' : 'OS error'
    console.error(`[Toggle] ${reason} toggling ${folder}: ${errorMessage(e)}`)
    return { success: false, enabled: wasEnabled, path: modPath }
  }

  console.log(`[Toggle] ${wasEnabled ? 'Disabled' : 'Enabled'} mod: ${stripDisabledSuffix(folder)}`)
  return { success: true, enabled: !wasEnabled, path: target }
}

/**
 * Installs a mod zip into `pluginsPath/<archive name>` and returns the mod's
 * display name. Collisions are checked before anything is written; a failure
 * partway through extraction leaves the partial folder behind.
 */
export function installModFromArchive(archivePath: string, pluginsPath: string): string {
  const zip = openArchive(archivePath)

  const manifestEntry = findArchiveEntry(zip, MANIFEST_FILE)
  if (!manifestEntry) {
    throw new ModManagerError('InvalidArchive', `No ${MANIFEST_FILE} found - not a valid mod`)
  }

  const folderName = path.parse(archivePath).name
  const destPath = path.join(pluginsPath, folderName)

  if (fs.existsSync(destPath)) {
    throw new ModManagerError('AlreadyExists', `Mod folder already exists: ${folderName}`)
  }
  if (fs.existsSync(destPath + DISABLED_SUFFIX)) {
    throw new ModManagerError('AlreadyExists', `Mod already exists (disabled): ${folderName}`)
  }

  try {
    fs.mkdirSync(destPath, { recursive: true })
    extractArchive(zip, destPath)
  } catch (e) {
    if (isPermissionError(e)) {
      throw new ModManagerError('AccessDenied', `Permission denied: ${errorMessage(e)}`, { cause: e })
    }
    throw new ModManagerError('InstallFailed', `Installation failed: ${errorMessage(e)}`, {
      cause: e
    })
  }

  const manifest = parseManifest(path.join(destPath, manifestEntry))
  const modName = manifest?.name ?? folderName
  console.log(`[Install] Successfully installed: ${modName}`)
  return modName
}

function resolveDisplayName(modPath: string, fallback: string): string {
  try {
    return parseManifest(path.join(modPath, MANIFEST_FILE))?.name ?? fallback
  } catch (e) {
    console.warn(`[Uninstall] Could not read manifest in ${modPath}: ${errorMessage(e)}`)
    return fallback
  }
}

function deleteAssociatedConfigs(configDir: string, keys: string[]): string[] {
  const deleted: string[] = []
  for (const file of getConfigFiles(configDir)) {
    const stem = path.parse(file).name.toLowerCase()
    if (!keys.some((key) => stem.includes(key))) continue

    try {
      fs.unlinkSync(path.join(configDir, file))
      deleted.push(file)
      console.log(`[Uninstall] Deleted config: ${file}`)
    } catch (e) {
      console.warn(`[Uninstall] Failed to delete config ${file}: ${errorMessage(e)}`)
    }
  }
  return deleted.sort()
}

export function uninstallMod(
  modPath: string,
  deleteAssociatedConfig: boolean = false,
  configDirectory?: string
): string {
  if (!fs.existsSync(modPath)) {
    throw new ModManagerError('NotFound', `Mod folder not found: ${modPath}`)
  }
  if (!fs.statSync(modPath).isDirectory()) {
    throw new ModManagerError('NotADirectory', `Not a directory: ${modPath}`)
  }

  const folderName = stripDisabledSuffix(path.basename(modPath))
  const modName = resolveDisplayName(modPath, folderName)

  try {
    fs.rmSync(modPath, { recursive: true, force: true })
  } catch (e) {
    if (isPermissionError(e)) {
      throw new ModManagerError('AccessDenied', `Permission denied: ${errorMessage(e)}`, { cause: e })
    }
    throw new ModManagerError('UninstallFailed', `Uninstall failed: ${errorMessage(e)}`, {
      cause: e
    })
  }

  let deletedConfigs: string[] = []
  if (deleteAssociatedConfig && configDirectory && fs.existsSync(configDirectory)) {
    const keys = [folderName.toLowerCase(), modName.toLowerCase()].filter(Boolean)
    deletedConfigs = deleteAssociatedConfigs(configDirectory, keys)
  }

  const message =
    deletedConfigs.length > 0
      ? `Uninstalled ${modName} and removed config(s): ${deletedConfigs.join(', ')}`
      : `Successfully uninstalled: ${modName}`
  console.log(`[Uninstall] ${message}`)
  return message
}
