import fs from 'fs'
import path from 'path'
import AdmZip from 'adm-zip'
import { ModManagerError, errorMessage } from '../errors'

export const ARCHIVE_EXTENSIONS = ['.zip']

export function isArchivePath(src: string): boolean {
  return ARCHIVE_EXTENSIONS.includes(path.extname(src).toLowerCase())
}

// adm-zip reads the central directory up front, so a corrupt file fails here
export function openArchive(src: string): AdmZip {
  if (!fs.existsSync(src)) {
    throw new ModManagerError('NotFound', `File not found: ${src}`)
  }
  if (!isArchivePath(src)) {
    throw new ModManagerError('InvalidArchive', `File must be a .zip archive: ${path.basename(src)}`)
  }

  try {
    const zip = new AdmZip(src)
    zip.getEntries()
    return zip
  } catch (e) {
    throw new ModManagerError('InvalidArchive', `Invalid or corrupted zip file: ${errorMessage(e)}`, {
      cause: e
    })
  }
}

export function listArchiveFiles(zip: AdmZip): string[] {
  return zip
    .getEntries()
    .filter((e) => !e.isDirectory)
    .map((e) => e.entryName)
}

// Entry path of the first file named `fileName` at any depth, matched case-insensitively
export function findArchiveEntry(zip: AdmZip, fileName: string): string | null {
  const wanted = fileName.toLowerCase()
  const match = listArchiveFiles(zip).find(
    (entry) => path.posix.basename(entry.replace(/\\/g, '/')).toLowerCase() === wanted
  )
  return match ?? null
}

export function extractArchive(zip: AdmZip, dest: string): void {
  zip.extractAllTo(dest, true)
}
