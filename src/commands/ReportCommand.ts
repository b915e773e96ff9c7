import { Command, CommandContext, CommandResult } from './types'
import { InvalidWindowError, WindowRequest } from '../contracts'
import { parsePeriod } from '../window/ReportWindow'
import { ReportRunResult } from '../reporting/ReportService'
import { debugLog, errorMessage } from '../logging/debugLog'

const USAGE = 'Usage: drop-digest report <10min|hour|day|custom> [--since <ISO date>] [--until <ISO date>] [--dry-run]'

interface ReportArgs {
  request: WindowRequest
  dryRun: boolean
}

function parseDate(flag: string, value: string | undefined): Date {
  if (value === undefined) {
    throw new InvalidWindowError(`${flag} requires a date value`)
  }
  const date = new Date(value)
  if (Number.isNaN(date.getTime())) {
    throw new InvalidWindowError(`Invalid date for ${flag}: "${value}"`)
  }
  return date
}

export function parseReportArgs(args: string[]): ReportArgs {
  let periodToken: string | undefined
  let since: Date | undefined
  let until: Date | undefined
  let dryRun = false

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--since':
        since = parseDate(arg, args[++i])
        break
      case '--until':
        until = parseDate(arg, args[++i])
        break
      case '--dry-run':
        dryRun = true
        break
      default:
        if (arg.startsWith('--') || periodToken !== undefined) {
          throw new InvalidWindowError(`Unexpected argument: ${arg}`)
        }
        periodToken = arg
    }
  }

  if (periodToken === undefined) {
    throw new InvalidWindowError('Missing report period')
  }

  const period = parsePeriod(periodToken)
  if (period === 'custom') {
    if (!since) {
      throw new InvalidWindowError('A custom report needs --since')
    }
    return { request: { period, since, until }, dryRun }
  }

  if (since || until) {
    throw new InvalidWindowError('--since and --until only apply to custom reports')
  }
  return { request: { period }, dryRun }
}

function describeRun(result: ReportRunResult, dryRun: boolean): CommandResult {
  const recorded = dryRun
    ? `New changes (dry run, not recorded): ${result.newChanges}`
    : `New changes recorded: ${result.newChanges}`

  if (!result.delivery) {
    return {
      exitCode: 0,
      output: `No changes for ${result.window.label}; report not sent.\n${recorded}`,
    }
  }

  if (!result.delivery.delivered) {
    return {
      exitCode: 1,
      output: `Report delivery failed: ${result.delivery.error}\n${recorded}`,
    }
  }

  const action = dryRun ? 'Report printed (dry run)' : 'Report sent'
  return { exitCode: 0, output: `${action}: ${result.subject}\n${recorded}` }
}

export const ReportCommand: Command = {
  name: 'report',
  aliases: ['run'],
  description: 'Poll Dropbox and deliver an activity report for a period',
  usage: USAGE,
  execute: async (context: CommandContext, args: string[]): Promise<CommandResult> => {
    let parsed: ReportArgs
    try {
      parsed = parseReportArgs(args)
    } catch (error) {
      return { exitCode: 1, output: `${errorMessage(error)}\n${USAGE}` }
    }

    try {
      const service = context.createService({ dryRun: parsed.dryRun })
      const result = await service.run(parsed.request)
      return describeRun(result, parsed.dryRun)
    } catch (error) {
      debugLog({ event: 'report_failed', error: errorMessage(error) })
      return { exitCode: 1, output: `Report failed: ${errorMessage(error)}` }
    }
  }
}
