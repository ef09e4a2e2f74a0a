import { describe, expect, it, vi } from 'vitest'
import {
  buildDependencyTree,
  checkDependencies,
  findInstalledDependency,
  findMissingDependencies,
  parseDependencyString
} from './dependencies'
import { IDependencyTree } from '../shared/types'
import { installedMod } from '../test/helpers'

describe('parseDependencyString', () => {
  it('splits author, name and version', () => {
    expect(parseDependencyString('bbepis-BepInExPack-5.4.2100')).toEqual({
      author: 'bbepis',
      name: 'BepInExPack',
      version: '5.4.2100',
      raw: 'bbepis-BepInExPack-5.4.2100'
    })
  })

  it('keeps dashes inside the name', () => {
    expect(parseDependencyString('Author-Multi-Part-Name-1.0.0')?.name).toBe('Multi-Part-Name')
  })

  it('trims surrounding whitespace but keeps the original token', () => {
    expect(parseDependencyString('  A-B-1.0  ')).toEqual({
      author: 'A',
      name: 'B',
      version: '1.0',
      raw: '  A-B-1.0  '
    })
  })

  it('rejects tokens with fewer than three segments', () => {
    expect(parseDependencyString('justaname')).toBeNull()
    expect(parseDependencyString('Author-Name')).toBeNull()
  })

  it('rejects empty parts', () => {
    expect(parseDependencyString('-Name-1.0.0')).toBeNull()
    expect(parseDependencyString('Author--1.0.0')).toBeNull()
    expect(parseDependencyString('Author-Name-')).toBeNull()
  })

  it('rejects empty and non-string input', () => {
    expect(parseDependencyString('')).toBeNull()
    expect(parseDependencyString(42)).toBeNull()
    expect(parseDependencyString(null)).toBeNull()
  })
})

describe('checkDependencies', () => {
  const core = installedMod({ name: 'Core', folderName: 'Dev-Core' })

  it('is satisfied when there are no dependencies', () => {
    expect(checkDependencies(installedMod({ name: 'Solo' }), [core])).toEqual({
      satisfied: true,
      missing: [],
      found: [],
      details: []
    })
  })

  it('finds a dependency by Author-Name folder', () => {
    const mod = installedMod({ name: 'X', dependencyIdentifiers: ['A-B-1.0.0'] })
    const result = checkDependencies(mod, [installedMod({ name: 'Whatever', folderName: 'A-B' })])

    expect(result.details).toEqual([
      {
        dependency: 'A-B-1.0.0',
        status: 'found',
        parsed: { author: 'A', name: 'B', version: '1.0.0' }
      }
    ])
    expect(result.satisfied).toBe(true)
  })

  it('finds a dependency by display name alone', () => {
    const mod = installedMod({ name: 'X', dependencyIdentifiers: ['Someone-Core-1.0.0'] })
    const plain = installedMod({ name: 'core', folderName: 'CoreFolder' })

    expect(checkDependencies(mod, [plain]).found).toEqual(['Someone-Core-1.0.0'])
  })

  it('ignores versions when matching', () => {
    const mod = installedMod({ name: 'X', dependencyIdentifiers: ['dev-core-9.9.9'] })
    expect(checkDependencies(mod, [core]).satisfied).toBe(true)
  })

  it('reports missing dependencies in declared order', () => {
    const mod = installedMod({
      name: 'X',
      dependencyIdentifiers: ['Dev-Zeta-1.0.0', 'Dev-Core-1.0.0', 'Dev-Alpha-2.0.0']
    })
    const result = checkDependencies(mod, [core])

    expect(result.satisfied).toBe(false)
    expect(result.missing).toEqual(['Dev-Zeta-1.0.0', 'Dev-Alpha-2.0.0'])
    expect(result.found).toEqual(['Dev-Core-1.0.0'])
    expect(result.details.map((d) => d.status)).toEqual(['missing', 'found', 'missing'])
  })

  it('marks unparseable tokens invalid without counting them', () => {
    const mod = installedMod({ name: 'X', dependencyIdentifiers: ['justaname'] })
    const result = checkDependencies(mod, [core])

    expect(result).toEqual({
      satisfied: true,
      missing: [],
      found: [],
      details: [
        {
          dependency: 'justaname',
          status: 'invalid',
          message: 'Could not parse dependency string'
        }
      ]
    })
  })
})

describe('findMissingDependencies', () => {
  it('returns nothing when every dependency is installed', () => {
    const mods = [
      installedMod({ name: 'Core', folderName: 'Dev-Core' }),
      installedMod({
        name: 'AddOn',
        folderName: 'Dev-AddOn',
        dependencyIdentifiers: ['Dev-Core-1.0.0']
      })
    ]
    expect(findMissingDependencies(mods)).toEqual({})
  })

  it('maps unsatisfied mods to their missing tokens', () => {
    const mods = [
      installedMod({
        name: 'Core',
        folderName: 'Dev-Core',
        dependencyIdentifiers: ['Dev-Gone-1.0.0']
      }),
      installedMod({
        name: 'AddOn',
        folderName: 'Dev-AddOn',
        dependencyIdentifiers: ['Dev-Core-1.0.0', 'Dev-Lost-3.0.0', 'Dev-Gone-1.0.0']
      })
    ]
    expect(findMissingDependencies(mods)).toEqual({
      Core: ['Dev-Gone-1.0.0'],
      AddOn: ['Dev-Lost-3.0.0', 'Dev-Gone-1.0.0']
    })
  })
})

describe('findMissingDependencies with an unreadable mod', () => {
  it('logs the failure and leaves that mod out', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {})
    const broken = installedMod({ name: 'Broken' })
    Object.defineProperty(broken, 'dependencyIdentifiers', {
      get() {
        throw new Error('unreadable')
      }
    })
    const addOn = installedMod({ name: 'AddOn', dependencyIdentifiers: ['Dev-Gone-1.0.0'] })
    const mods = [broken, addOn]

    expect(findMissingDependencies(mods)).toEqual({ AddOn: ['Dev-Gone-1.0.0'] })
    expect(errors).toHaveBeenCalledWith(
      '[Dependencies] Error checking dependencies for Broken: unreadable'
    )
    errors.mockRestore()
  })
})

describe('findInstalledDependency', () => {
  it('matches a folder containing the dependency name', () => {
    const mods = [installedMod({ name: 'Other', folderName: 'Someone-CoreLib' })]
    const dep = parseDependencyString('Dev-CoreLib-1.0.0')
    expect(dep && findInstalledDependency(dep, mods)?.name).toBe('Other')
  })
})

describe('buildDependencyTree', () => {
  const alpha = installedMod({
    name: 'Alpha',
    folderName: 'Dev-Alpha',
    dependencyIdentifiers: ['Dev-Beta-1.0.0']
  })
  const beta = installedMod({
    name: 'Beta',
    folderName: 'Dev-Beta',
    dependencyIdentifiers: ['Dev-Alpha-1.0.0']
  })

  const depthOf = (tree: IDependencyTree): number =>
    tree.children.length === 0 ? 0 : 1 + Math.max(...tree.children.map(depthOf))

  it('cuts a dependency cycle off at maxDepth', () => {
    expect(buildDependencyTree(alpha, [alpha, beta], 3)).toEqual({
      name: 'Alpha',
      version: '1.0.0',
      status: 'root',
      children: [
        {
          name: 'Beta',
          version: '1.0.0',
          status: 'installed',
          children: [
            {
              name: 'Alpha',
              version: '1.0.0',
              status: 'installed',
              children: [{ name: 'Beta', version: '1.0.0', status: 'truncated', children: [] }]
            }
          ]
        }
      ]
    })
  })

  it('terminates on a cycle with the default depth', () => {
    const tree = buildDependencyTree(alpha, [alpha, beta])
    expect(depthOf(tree)).toBe(10)

    let node = tree
    while (node.children.length > 0) node = node.children[0]
    expect(node.status).toBe('truncated')
  })

  it('emits missing and invalid leaves', () => {
    const root = installedMod({
      name: 'Root',
      folderName: 'Dev-Root',
      dependencyIdentifiers: ['Dev-Gone-2.0.0', 'bad']
    })

    expect(buildDependencyTree(root, [root]).children).toEqual([
      { name: 'Dev-Gone', version: '2.0.0', status: 'missing', children: [] },
      { name: 'bad', version: '', status: 'invalid', children: [] }
    ])
  })

  it('returns a truncated root when maxDepth is zero', () => {
    expect(buildDependencyTree(alpha, [alpha, beta], 0)).toEqual({
      name: 'Alpha',
      version: '1.0.0',
      status: 'truncated',
      children: []
    })
  })
})
