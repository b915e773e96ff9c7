import axios, { AxiosInstance } from 'axios'

export const DROPBOX_API_URL = 'https://api.dropboxapi.com/2'
export const DROPBOX_CONTENT_URL = 'https://content.dropboxapi.com/2'

const DEFAULT_TIMEOUT_MS = 30_000

export function createDropboxHttpClient(token: string, timeout: number = DEFAULT_TIMEOUT_MS): AxiosInstance {
  return axios.create({
    timeout,
    headers: {
      Authorization: `Bearer ${token}`,
    },
  })
}

export function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status
    return status ? `HTTP ${status}: ${error.message}` : error.message
  }
  return error instanceof Error ? error.message : String(error)
}
