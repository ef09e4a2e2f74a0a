import { ICatalogPackage, IDependencyTree, IInstalledMod } from '../../shared/types'

export function formatModInfo(mod: IInstalledMod): string {
  const lines = [
    `Name: ${mod.name}`,
    `Version: ${mod.version}`,
    `Status: ${mod.enabled ? '✓ Enabled' : '✗ Disabled'}`,
    `Description: ${mod.description}`
  ]

  if (mod.dependencyIdentifiers.length > 0) {
    lines.push(`Dependencies (${mod.dependencyIdentifiers.length}):`)
    for (const dep of mod.dependencyIdentifiers) lines.push(`  - ${dep}`)
  }
  if (mod.websiteUrl) lines.push(`Website: ${mod.websiteUrl}`)
  lines.push(`Path: ${mod.folderPath}`)

  return lines.join('\n')
}

export function formatDependencyTree(tree: IDependencyTree, indent = 0): string {
  const prefix = '  '.repeat(indent)
  const version = tree.version ? ` v${tree.version}` : ''

  let line: string
  switch (tree.status) {
    case 'missing':
      line = `${prefix}✗ ${tree.name}${version} (MISSING)`
      break
    case 'invalid':
      line = `${prefix}? ${tree.name} (INVALID)`
      break
    case 'installed':
      line = `${prefix}✓ ${tree.name}${version}`
      break
    case 'truncated':
      line = `${prefix}• ${tree.name}${version}\n${prefix}  ... (truncated)`
      break
    default:
      line = `${prefix}• ${tree.name}${version}`
  }

  return [line, ...tree.children.map((child) => formatDependencyTree(child, indent + 1))].join('\n')
}

const MAX_LISTED_DEPENDENCIES = 10

export function formatPackageInfo(pkg: ICatalogPackage): string {
  const lines = [
    `Name: ${pkg.fullName}`,
    `Version: ${pkg.version}`,
    `Author: ${pkg.owner}`,
    `Downloads: ${pkg.downloads.toLocaleString('en-US')}`,
    `Rating: ${pkg.rating}`,
    `Description: ${pkg.description}`
  ]

  if (pkg.categories.length > 0) lines.push(`Categories: ${pkg.categories.join(', ')}`)

  if (pkg.dependencies.length > 0) {
    lines.push(`Dependencies (${pkg.dependencies.length}):`)
    for (const dep of pkg.dependencies.slice(0, MAX_LISTED_DEPENDENCIES)) lines.push(`  - ${dep}`)
    if (pkg.dependencies.length > MAX_LISTED_DEPENDENCIES) {
      lines.push(`  ... and ${pkg.dependencies.length - MAX_LISTED_DEPENDENCIES} more`)
    }
  }

  if (pkg.isDeprecated) lines.push('⚠ This package is DEPRECATED')
  return lines.join('\n')
}

export function formatFileSize(bytes: number): string {
  let size = bytes
  for (const unit of ['B', 'KB', 'MB', 'GB']) {
    if (size < 1024) return `${size.toFixed(1)} ${unit}`
    size /= 1024
  }
  return `${size.toFixed(1)} TB`
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (text.length <= maxLength) return text
  return text.slice(0, maxLength - suffix.length) + suffix
}
