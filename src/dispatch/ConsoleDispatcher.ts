import { Dispatcher } from './Dispatcher'
import { DispatchMessage, DispatchResult } from '../contracts'

/**
 * Prints the report instead of sending it (dry runs)
 */
export class ConsoleDispatcher implements Dispatcher {
  constructor(private write: (text: string) => void = text => console.log(text)) {}

  async send(message: DispatchMessage): Promise<DispatchResult> {
    const to = message.recipients.length > 0 ? message.recipients.join(', ') : '(default recipients)'
    this.write(`To: ${to}\nSubject: ${message.subject}\n\n${message.body}`)
    return { delivered: true }
  }
}
