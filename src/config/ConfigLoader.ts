import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { Credentials, DigestConfig } from '../contracts/types'
import { DigestConfigSchema } from '../contracts/schemas'

export const CONFIG_FILE_NAMES = ['.drop-digest.config.json', 'drop-digest.config.json']

export class ConfigLoader {
  private readonly config: DigestConfig

  constructor(private configPath?: string) {
    this.config = this.loadConfig()
  }

  static defaults(): DigestConfig {
    return DigestConfigSchema.parse({})
  }

  private findConfigFile(): string | null {
    // Start from current directory and walk up
    let currentDir = process.cwd()

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private loadConfig(): DigestConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.defaults()
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)
      return DigestConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.defaults()
    }
  }

  getConfig(): DigestConfig {
    return this.config
  }

  /**
   * Secrets and delivery addresses come from the environment. Recipients
   * and sender given there take precedence over the config file.
   */
  getCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
    const recipients = parseRecipients(env.REPORT_RECIPIENTS)
    return {
      dropboxToken: nonEmpty(env.DROPBOX_ACCESS_TOKEN),
      emailApiKey: nonEmpty(env.RESEND_API_KEY),
      from: nonEmpty(env.REPORT_FROM) ?? this.config.email.from,
      recipients: recipients.length > 0 ? recipients : this.config.email.recipients,
    }
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function parseRecipients(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map(address => address.trim())
    .filter(address => address.length > 0)
}
