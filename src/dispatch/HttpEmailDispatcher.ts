import axios, { AxiosInstance } from 'axios'
import { Dispatcher } from './Dispatcher'
import { DispatchMessage, DispatchResult } from '../contracts'
import { describeHttpError } from '../sources/dropbox'
import { debugLog } from '../logging/debugLog'

export const RESEND_EMAILS_URL = 'https://api.resend.com/emails'

export interface HttpEmailDispatcherOptions {
  from: string
  defaultRecipients?: string[]
  endpoint?: string
}

/**
 * Sends reports through the Resend HTTP API, as plain text with an
 * optional HTML alternative
 */
export class HttpEmailDispatcher implements Dispatcher {
  private from: string
  private defaultRecipients: string[]
  private endpoint: string

  constructor(
    private http: AxiosInstance,
    options: HttpEmailDispatcherOptions
  ) {
    this.from = options.from
    this.defaultRecipients = options.defaultRecipients ?? []
    this.endpoint = options.endpoint ?? RESEND_EMAILS_URL
  }

  static create(apiKey: string, options: HttpEmailDispatcherOptions): HttpEmailDispatcher {
    const http = axios.create({
      timeout: 30_000,
      headers: { Authorization: `Bearer ${apiKey}` },
    })
    return new HttpEmailDispatcher(http, options)
  }

  async send(message: DispatchMessage): Promise<DispatchResult> {
    const recipients = message.recipients.length > 0 ? message.recipients : this.defaultRecipients
    if (recipients.length === 0) {
      return { delivered: false, error: 'No recipients configured' }
    }

    try {
      await this.http.post(this.endpoint, {
        from: this.from,
        to: recipients,
        subject: message.subject,
        text: message.body,
        ...(message.html ? { html: message.html } : {}),
      })
      debugLog({ event: 'report_sent', recipients: recipients.length, subject: message.subject })
      return { delivered: true }
    } catch (error) {
      const reason = describeHttpError(error)
      debugLog({ event: 'report_send_failed', subject: message.subject, error: reason })
      return { delivered: false, error: `Email delivery failed: ${reason}` }
    }
  }
}
