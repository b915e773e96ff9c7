import { ConfigLoader } from '../config/ConfigLoader'
import { Storage } from '../storage/Storage'
import { ReportService } from './ReportService'
import { createDropboxHttpClient } from '../sources/dropbox'
import { DropboxChangeSource } from '../sources/DropboxChangeSource'
import { DropboxContentFetcher } from '../sources/DropboxContentFetcher'
import { KeywordContentClassifier } from '../classification/KeywordContentClassifier'
import { Dispatcher } from '../dispatch/Dispatcher'
import { ConsoleDispatcher } from '../dispatch/ConsoleDispatcher'
import { HttpEmailDispatcher } from '../dispatch/HttpEmailDispatcher'

export interface CreateReportServiceOptions {
  dryRun: boolean
  env?: NodeJS.ProcessEnv
}

/**
 * Wire the Dropbox source, classifier and delivery channel from config and
 * environment. Throws when a credential the run needs is missing.
 */
export function createReportService(
  configLoader: ConfigLoader,
  storage: Storage,
  options: CreateReportServiceOptions
): ReportService {
  const config = configLoader.getConfig()
  const credentials = configLoader.getCredentials(options.env)

  if (!credentials.dropboxToken) {
    throw new Error('DROPBOX_ACCESS_TOKEN is not set')
  }

  const http = createDropboxHttpClient(credentials.dropboxToken)
  const source = new DropboxChangeSource(http, {
    rootPath: config.dropbox.rootPath,
    includeDeleted: config.dropbox.includeDeleted,
  })
  const classifier = config.analysis.classifyContent
    ? new KeywordContentClassifier(new DropboxContentFetcher(http), {
      maxSampleBytes: config.analysis.maxSampleBytes,
      maxKeywords: config.analysis.maxKeywords,
    })
    : null

  let dispatcher: Dispatcher
  if (options.dryRun) {
    dispatcher = new ConsoleDispatcher()
  } else {
    if (!credentials.emailApiKey) {
      throw new Error('RESEND_API_KEY is not set')
    }
    if (!credentials.from) {
      throw new Error('No sender address: set REPORT_FROM or email.from in the config file')
    }
    dispatcher = HttpEmailDispatcher.create(credentials.emailApiKey, {
      from: credentials.from,
      defaultRecipients: credentials.recipients,
    })
  }

  return new ReportService({
    config,
    source,
    storage,
    dispatcher,
    classifier,
    recipients: credentials.recipients,
    dryRun: options.dryRun,
  })
}
