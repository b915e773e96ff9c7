import { AxiosInstance } from 'axios'
import { ContentFetcher } from '../classification/ContentClassifier'
import { DROPBOX_CONTENT_URL, describeHttpError } from './dropbox'

/**
 * Downloads the first bytes of a Dropbox file as text
 */
export class DropboxContentFetcher implements ContentFetcher {
  constructor(private http: AxiosInstance) {}

  async fetchSample(path: string, maxBytes: number): Promise<string> {
    const dropboxPath = path.startsWith('/') ? path : `/${path}`

    try {
      const response = await this.http.post(`${DROPBOX_CONTENT_URL}/files/download`, undefined, {
        headers: {
          'Dropbox-API-Arg': toHttpHeaderSafeJson({ path: dropboxPath }),
          Range: `bytes=0-${maxBytes - 1}`,
        },
        responseType: 'text',
      })

      if (typeof response.data !== 'string') {
        throw new Error('download did not return text')
      }
      return response.data.slice(0, maxBytes)
    } catch (error) {
      throw new Error(`Dropbox download of ${dropboxPath} failed: ${describeHttpError(error)}`, { cause: error })
    }
  }
}

// Dropbox-API-Arg must be ASCII; non-ASCII characters are sent as \uXXXX escapes
export function toHttpHeaderSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, c =>
    '\\u' + c.charCodeAt(0).toString(16).padStart(4, '0')
  )
}
