import { Command, CommandContext, CommandResult } from './types'
import { ReportHistoryManager } from '../history/ReportHistoryManager'

const USAGE = 'Usage: drop-digest reset [--history]'

export const ResetCommand: Command = {
  name: 'reset',
  description: 'Forget recorded changes and report history',
  usage: USAGE,
  execute: async (context: CommandContext, args: string[]): Promise<CommandResult> => {
    const unexpected = args.find(arg => arg !== '--history')
    if (unexpected !== undefined) {
      return { exitCode: 1, output: `Unexpected argument: ${unexpected}\n${USAGE}` }
    }

    if (args.includes('--history')) {
      const config = context.configLoader.getConfig()
      await new ReportHistoryManager(context.storage, config.storage.maxReportRecords).clearHistory()
      return { exitCode: 0, output: 'Report history has been cleared.' }
    }

    await context.storage.clearAll()
    return { exitCode: 0, output: 'Recorded changes and report history have been cleared.' }
  }
}
