import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { USAGE, createCommands, runCommand } from './commands'
import { ModManager } from './modManager'
import { SettingsManager } from './settings'
import { CatalogClient } from './utils/catalog'
import { PACKAGES_URL, fakeHttp, loadPackages } from '../test/fakeHttp'
import { makeTempDir, removeDir, writeMod } from '../test/helpers'

let root: string
let plugins: string
let lines: string[]
let run: (...argv: string[]) => Promise<number>

beforeEach(() => {
  root = makeTempDir()
  plugins = path.join(root, 'BepInEx', 'plugins')
  fs.mkdirSync(plugins, { recursive: true })
  lines = []

  const settings = new SettingsManager(path.join(root, 'data'))
  settings.set({ pluginsPath: plugins })
  const { http } = fakeHttp({ [PACKAGES_URL]: { data: loadPackages() } })
  const catalog = new CatalogClient({ baseUrl: 'https://catalog.test', community: 'testgame', http })
  const out = (line: string) => lines.push(line)
  const commands = createCommands(new ModManager(settings, catalog), settings, out)
  run = (...argv) => runCommand(commands, argv, out)
})

afterEach(() => {
  removeDir(root)
})

describe('runCommand', () => {
  it('prints usage for an unknown command', async () => {
    expect(await run('frobnicate')).toBe(1)
    expect(lines).toEqual(['Unknown command: frobnicate\n', USAGE])
  })

  it('defaults to help', async () => {
    expect(await run()).toBe(0)
    expect(lines).toEqual([USAGE])
  })

  it('rejects a missing argument', async () => {
    await expect(run('info')).rejects.toThrow('Missing argument: mod')
  })
})

describe('mod commands', () => {
  it('lists mods with their state', async () => {
    writeMod(plugins, 'Dev-Core', { name: 'Core', version_number: '1.2.0' })
    writeMod(plugins, 'Dev-Extra.disabled', { name: 'Extra', version_number: '0.1.0' })

    await run('list')
    expect(lines).toEqual(['1. [ON ] Core v1.2.0', '2. [OFF] Extra v0.1.0'])
  })

  it('filters the list', async () => {
    writeMod(plugins, 'Dev-Core', { name: 'Core' })
    await run('list', 'zzz')
    expect(lines).toEqual(['No mods found.'])
  })

  it('toggles a mod', async () => {
    writeMod(plugins, 'Dev-Core', { name: 'Core' })

    await run('toggle', 'Core')
    await run('toggle', 'Core')
    expect(lines).toEqual(['Mod disabled.', 'Mod enabled.'])
  })

  it('reports dependency status for one mod and for all', async () => {
    writeMod(plugins, 'Dev-Core', { name: 'Core' })
    writeMod(plugins, 'Dev-App', { name: 'App', dependencies: ['Dev-Core-1.0.0', 'Dev-Gone-1.0.0'] })

    await run('deps', 'App')
    expect(lines).toEqual(['  [found] Dev-Core-1.0.0', '  [missing] Dev-Gone-1.0.0', 'Missing 1.'])

    lines.length = 0
    await run('deps')
    expect(lines).toEqual(['App:', '  - Dev-Gone-1.0.0'])

    lines.length = 0
    await run('deps', 'Core')
    expect(lines).toEqual(['No dependencies.'])
  })

  it('prints a dependency tree', async () => {
    writeMod(plugins, 'Dev-Core', { name: 'Core', version_number: '2.0.0' })
    writeMod(plugins, 'Dev-App', { name: 'App', dependencies: ['Dev-Core-2.0.0'] })

    await run('tree', 'App')
    expect(lines).toEqual(['• App v0.0.0\n  ✓ Core v2.0.0'])
  })

  it('lists and edits config files', async () => {
    const configDir = path.join(root, 'BepInEx', 'config')
    fs.mkdirSync(configDir)
    fs.writeFileSync(path.join(configDir, 'dev.core.cfg'), '[General]\nEnabled = true\n')

    await run('config')
    await run('config', 'dev.core.cfg', 'Enabled=false')
    await run('config', 'dev.core.cfg')
    expect(lines).toEqual(['dev.core.cfg', 'Config saved.', 'Enabled = false'])
  })
})

describe('catalog commands', () => {
  it('searches the catalog', async () => {
    await run('search', 'stats')
    expect(lines).toEqual(['1. Dev-ItemStats v2.1.0 - Shows item stats'])
  })

  it('reports an empty search', async () => {
    await run('search', 'nothing-matches-this')
    expect(lines).toEqual(['No packages found.'])
  })

  it('refreshes the catalog', async () => {
    await run('refresh')
    expect(lines).toEqual(['Catalog refreshed: 4 packages.'])
  })

  it('shows package details', async () => {
    await run('show', 'bbepis-BepInExPack')
    expect(lines[0].split('\n').slice(0, 4)).toEqual([
      'Name: bbepis-BepInExPack',
      'Version: 5.4.2100',
      'Author: bbepis',
      'Downloads: 5,000'
    ])
  })
})
