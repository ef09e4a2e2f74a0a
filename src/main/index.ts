#!/usr/bin/env node
import { ModManager, IDownloadProgressEvent } from './modManager'
import { SettingsManager } from './settings'
import { createCommands, runCommand } from './commands'
import { isModManagerError, errorMessage } from './errors'

const settingsManager = new SettingsManager()
const modManager = new ModManager(settingsManager)

let lastProgress = -1
modManager.on('download-progress', (data: IDownloadProgressEvent) => {
  // Only redraw on whole-step changes; chunks arrive far more often
  if (data.progress === lastProgress) return
  lastProgress = data.progress
  process.stdout.write(`\rDownloading ${data.fullName}... ${data.progress}%`)
  if (data.progress >= 100) process.stdout.write('\n')
})

async function main(): Promise<void> {
  const commands = createCommands(modManager, settingsManager)
  try {
    process.exitCode = await runCommand(commands, process.argv.slice(2))
  } catch (e) {
    if (isModManagerError(e)) {
      console.error(`✗ ${e.kind}: ${e.message}`)
    } else {
      console.error(`✗ Unexpected error: ${errorMessage(e)}`)
    }
    process.exitCode = 1
  }
}

void main()
