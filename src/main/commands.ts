import path from 'path'
import fs from 'fs'
import { ICatalogPackage } from '../shared/types'
import { ModManager } from './modManager'
import { SettingsManager } from './settings'
import { getConfigFiles, parseConfigFile, saveConfigFile } from './features/configEditor'
import {
  formatDependencyTree,
  formatFileSize,
  formatModInfo,
  formatPackageInfo,
  truncate
} from './utils/format'
import { filterModsByName } from './scanner'
import { ModManagerError } from './errors'

export type Output = (line: string) => void

type Handler = (args: string[]) => Promise<void> | void

export const USAGE = `modkeeper - manage BepInEx plugin mods

Commands:
  set-path <dir>                  Set the BepInEx/plugins directory
  list [filter]                   List installed mods
  info <mod>                      Show details for one mod
  toggle <mod>                    Enable or disable a mod
  install <file.zip>              Install a mod from a zip archive
  uninstall <mod> [--configs]     Remove a mod (and its .cfg files)
  deps [mod]                      Check dependencies (all mods when omitted)
  tree <mod> [depth]              Show a mod's dependency tree
  search <query> [limit]          Search the catalog
  popular [limit]                 Most downloaded catalog packages
  recent [limit]                  Recently updated catalog packages
  show <Owner-Name>               Show catalog package details
  refresh                         Re-fetch the catalog
  download <Owner-Name>           Download a catalog package without installing
  get <Owner-Name>                Download and install a catalog package
  config [file] [key=value...]    List, show or edit config files
  help                            This message`

function requireArg(args: string[], index: number, name: string): string {
  const value = args[index]
  if (!value) throw new Error(`Missing argument: ${name}`)
  return value
}

function parseLimit(value: string | undefined, fallback: number): number {
  const n = Number(value)
  return Number.isInteger(n) && n > 0 ? n : fallback
}

export function createCommands(
  modManager: ModManager,
  settingsManager: SettingsManager,
  out: Output = (line) => console.log(line)
): Map<string, Handler> {
  const commands = new Map<string, Handler>()
  const handle = (name: string, handler: Handler) => commands.set(name, handler)

  const printPackages = (packages: ICatalogPackage[]) => {
    if (packages.length === 0) {
      out('No packages found.')
      return
    }
    packages.forEach((p, i) => {
      out(`${i + 1}. ${p.fullName} v${p.version} - ${truncate(p.description, 60)}`)
    })
  }

  handle('help', () => out(USAGE))

  handle('set-path', (args) => {
    const dir = path.resolve(requireArg(args, 0, 'dir'))
    if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
      throw new ModManagerError('NotADirectory', `Path does not exist or is not a directory: ${dir}`)
    }
    settingsManager.set({ pluginsPath: dir })
    out(`Plugins path set to ${dir}`)
  })

  handle('list', (args) => {
    const mods = filterModsByName(modManager.getMods(), args[0] ?? '')
    if (mods.length === 0) {
      out('No mods found.')
      return
    }
    mods.forEach((m, i) => {
      out(`${i + 1}. [${m.enabled ? 'ON ' : 'OFF'}] ${m.name} v${m.version}`)
    })
  })

  handle('info', (args) => {
    out(formatModInfo(modManager.findMod(requireArg(args, 0, 'mod'))))
  })

  handle('toggle', (args) => {
    const result = modManager.toggleMod(requireArg(args, 0, 'mod'))
    if (!result.success) {
      out('Toggle failed; the mod was left unchanged.')
      return
    }
    out(result.enabled ? 'Mod enabled.' : 'Mod disabled.')
  })

  handle('install', (args) => {
    const name = modManager.installFromFile(path.resolve(requireArg(args, 0, 'file')))
    out(`Successfully installed: ${name}`)
  })

  handle('uninstall', (args) => {
    const target = requireArg(args, 0, 'mod')
    out(modManager.uninstallMod(target, args.includes('--configs')))
  })

  handle('deps', (args) => {
    if (args[0]) {
      const result = modManager.checkMod(args[0])
      if (result.details.length === 0) {
        out('No dependencies.')
        return
      }
      for (const d of result.details) out(`  [${d.status}] ${d.dependency}`)
      out(result.satisfied ? 'All dependencies satisfied.' : `Missing ${result.missing.length}.`)
      return
    }

    const missing = Object.entries(modManager.getMissingDependencies())
    if (missing.length === 0) {
      out('All dependencies satisfied.')
      return
    }
    for (const [modName, deps] of missing) {
      out(`${modName}:`)
      for (const dep of deps) out(`  - ${dep}`)
    }
  })

  handle('tree', (args) => {
    const depth = args[1] ? parseLimit(args[1], 10) : undefined
    out(formatDependencyTree(modManager.getTree(requireArg(args, 0, 'mod'), depth)))
  })

  handle('search', async (args) => {
    const query = requireArg(args, 0, 'query')
    printPackages(await modManager.searchCatalog(query, parseLimit(args[1], 20)))
  })

  handle('popular', async (args) => {
    printPackages(await modManager.popular(parseLimit(args[0], 20)))
  })

  handle('recent', async (args) => {
    printPackages(await modManager.recent(parseLimit(args[0], 20)))
  })

  handle('show', async (args) => {
    out(formatPackageInfo(await modManager.getPackage(requireArg(args, 0, 'package'))))
  })

  handle('refresh', async () => {
    const packages = await modManager.refreshCatalog()
    out(`Catalog refreshed: ${packages.length} packages.`)
  })

  handle('download', async (args) => {
    const file = await modManager.downloadPackage(requireArg(args, 0, 'package'))
    out(`Downloaded ${path.basename(file)} (${formatFileSize(fs.statSync(file).size)})`)
  })

  handle('get', async (args) => {
    const result = await modManager.installFromCatalog(requireArg(args, 0, 'package'))
    out(`Successfully installed: ${result.name}`)
    if (result.dependencies && !result.dependencies.satisfied) {
      out('Missing dependencies:')
      for (const dep of result.dependencies.missing) out(`  - ${dep}`)
    }
  })

  handle('config', (args) => {
    const configDir = settingsManager.getConfigDir()
    if (!configDir) throw new ModManagerError('NotConfigured', 'Plugins path not set.')

    if (!args[0]) {
      const files = getConfigFiles(configDir)
      out(files.length > 0 ? files.join('\n') : 'No config files found.')
      return
    }

    const file = path.join(configDir, args[0])
    const edits = args.slice(1).filter((a) => a.includes('='))
    if (edits.length === 0) {
      for (const [key, value] of Object.entries(parseConfigFile(file))) out(`${key} = ${value}`)
      return
    }

    const updates: Record<string, string> = {}
    for (const edit of edits) {
      const eq = edit.indexOf('=')
      updates[edit.slice(0, eq).trim()] = edit.slice(eq + 1).trim()
    }
    out(saveConfigFile(file, updates) ? 'Config saved.' : 'Failed to save config.')
  })

  return commands
}

export async function runCommand(
  commands: Map<string, Handler>,
  argv: string[],
  out: Output = (line) => console.log(line)
): Promise<number> {
  const [name = 'help', ...args] = argv
  const handler = commands.get(name)
  if (!handler) {
    out(`Unknown command: ${name}\n`)
    out(USAGE)
    return 1
  }
  await handler(args)
  return 0
}
