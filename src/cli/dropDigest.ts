#!/usr/bin/env node

import { ConfigLoader } from '../config/ConfigLoader'
import { FileStorage } from '../storage/FileStorage'
import { Storage } from '../storage/Storage'
import { CommandContext, CommandResult, createDefaultRegistry } from '../commands'
import { createReportService } from '../reporting/createReportService'
import { debugLog, errorMessage } from '../logging/debugLog'

export interface CliDeps {
  configLoader?: ConfigLoader
  storage?: Storage
  env?: NodeJS.ProcessEnv
  createService?: CommandContext['createService']
}

export async function run(argv: string[], deps: CliDeps = {}): Promise<CommandResult> {
  const env = deps.env ?? process.env
  const configLoader = deps.configLoader ?? new ConfigLoader()
  const storage = deps.storage ?? new FileStorage(configLoader.getConfig().storage.dataDir)

  const context: CommandContext = {
    configLoader,
    storage,
    env,
    createService: deps.createService ??
      (options => createReportService(configLoader, storage, { dryRun: options.dryRun, env })),
  }

  const [name = 'help', ...args] = argv
  debugLog({ event: 'command', name, args })
  return createDefaultRegistry().dispatch(name, context, args)
}

// Only run if this is the main module
if (require.main === module) {
  run(process.argv.slice(2))
    .then(result => {
      if (result.output) {
        const write = result.exitCode === 0 ? console.log : console.error
        write(result.output)
      }
      process.exitCode = result.exitCode
    })
    .catch((error: unknown) => {
      console.error('drop-digest failed:', errorMessage(error))
      process.exitCode = 1
    })
}
