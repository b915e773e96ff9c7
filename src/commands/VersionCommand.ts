import { Command, CommandResult } from './types'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['v', '--version', '-v'],
  description: 'Show drop-digest version',
  execute: async (): Promise<CommandResult> => {
    return {
      exitCode: 0,
      output: `drop-digest v${packageJson.version}`,
    }
  }
}
