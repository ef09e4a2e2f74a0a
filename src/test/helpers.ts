import fs from 'fs'
import os from 'os'
import path from 'path'
import AdmZip from 'adm-zip'
import { IInstalledMod } from '../shared/types'

export function makeTempDir(prefix = 'modkeeper-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true })
}

export function writeMod(pluginsDir: string, folder: string, manifest?: object | string): string {
  const modDir = path.join(pluginsDir, folder)
  fs.mkdirSync(modDir, { recursive: true })
  if (manifest !== undefined) {
    const content = typeof manifest === 'string' ? manifest : JSON.stringify(manifest)
    fs.writeFileSync(path.join(modDir, 'manifest.json'), content)
  }
  return modDir
}

export function writeZip(zipPath: string, files: Record<string, string>): string {
  const zip = new AdmZip()
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf8'))
  }
  zip.writeZip(zipPath)
  return zipPath
}

export function installedMod(overrides: Partial<IInstalledMod> & { name: string }): IInstalledMod {
  return {
    version: '1.0.0',
    description: '',
    websiteUrl: '',
    dependencyIdentifiers: [],
    folderPath: `/plugins/${overrides.folderName ?? overrides.name}`,
    folderName: overrides.name,
    enabled: true,
    ...overrides
  }
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (e) {
    return e
  }
  throw new Error('Expected function to throw')
}
