export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { ReportCommand, parseReportArgs } from './ReportCommand'
export { StatusCommand } from './StatusCommand'
export { ResetCommand } from './ResetCommand'
export { VersionCommand } from './VersionCommand'
export { createHelpCommand, formatHelp } from './HelpCommand'

import { CommandRegistry } from './CommandRegistry'
import { ReportCommand } from './ReportCommand'
import { StatusCommand } from './StatusCommand'
import { ResetCommand } from './ResetCommand'
import { VersionCommand } from './VersionCommand'
import { createHelpCommand } from './HelpCommand'

export const defaultCommands = [
  ReportCommand,
  StatusCommand,
  ResetCommand,
  VersionCommand,
]

export function createDefaultRegistry(): CommandRegistry {
  const registry = CommandRegistry.createWithDefaults(defaultCommands)
  registry.register(createHelpCommand(() => registry.getAll()))
  return registry
}
