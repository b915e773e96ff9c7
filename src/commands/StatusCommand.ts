import { Command, CommandContext, CommandResult } from './types'
import { ReportHistoryManager } from '../history/ReportHistoryManager'
import { ChangeLogManager } from '../changes/ChangeLogManager'
import { formatTimestamp } from '../window/ReportWindow'

const configured = (value: unknown): string => (value ? 'configured' : 'missing')

export const StatusCommand: Command = {
  name: 'status',
  description: 'Show configuration, credentials and recent reports',
  execute: async (context: CommandContext): Promise<CommandResult> => {
    const config = context.configLoader.getConfig()
    const credentials = context.configLoader.getCredentials(context.env)
    const history = new ReportHistoryManager(context.storage, config.storage.maxReportRecords)
    const changeLog = new ChangeLogManager(context.storage, config.storage.maxChangeEntries)

    const [reports, entries] = await Promise.all([
      history.getRecentReports(5),
      changeLog.getEntries(),
    ])

    let message = 'Configuration:\n'
    message += `   Dropbox root: ${config.dropbox.rootPath || '/'}\n`
    message += `   Content classification: ${config.analysis.classifyContent ? 'on' : 'off'}\n`
    message += `   Send empty reports: ${config.report.sendEmptyReports ? 'yes' : 'no'}\n`
    message += `   Recipients: ${credentials.recipients.length > 0 ? credentials.recipients.join(', ') : 'none'}\n\n`

    message += 'Credentials:\n'
    message += `   DROPBOX_ACCESS_TOKEN: ${configured(credentials.dropboxToken)}\n`
    message += `   RESEND_API_KEY: ${configured(credentials.emailApiKey)}\n`
    message += `   Sender: ${credentials.from ?? 'missing'}\n\n`

    message += `Tracked changes: ${entries.length}\n\n`

    if (reports.length > 0) {
      message += 'Recent Reports:\n'
      reports.forEach((report, i) => {
        const status = report.delivered ? '✓' : '✗'
        const time = formatTimestamp(new Date(report.generatedAt))
        message += `   ${i + 1}. [${time}] ${status} ${report.subject}\n`
        if (report.error) {
          message += `      → ${report.error}\n`
        }
      })
    } else {
      message += 'No reports generated yet.\n'
    }

    return { exitCode: 0, output: message.trimEnd() }
  }
}
