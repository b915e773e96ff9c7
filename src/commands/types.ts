import { ConfigLoader } from '../config/ConfigLoader'
import { Storage } from '../storage/Storage'
import { ReportService } from '../reporting/ReportService'

export interface CommandResult {
  exitCode: number
  output: string
}

export interface ServiceOptions {
  dryRun: boolean
}

export interface CommandContext {
  configLoader: ConfigLoader
  storage: Storage
  env: NodeJS.ProcessEnv
  createService: (options: ServiceOptions) => ReportService
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  usage?: string
  execute: (context: CommandContext, args: string[]) => Promise<CommandResult>
}
