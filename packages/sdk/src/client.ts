import { ApiError, NotFoundError } from './errors'

export type FetchLike = typeof fetch

function errorMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined
  const error = Reflect.get(data, 'error')
  return typeof error === 'string' ? error : undefined
}

export class HTTPClient {
  private baseUrl: string
  private fetcher: FetchLike

  constructor(baseUrl: string, fetcher: FetchLike = (input, init) => fetch(input, init)) {
    this.baseUrl = baseUrl.replace(/\/$/, '')
    this.fetcher = fetcher
  }

  /**
   * Issues a GET against the read API and returns the parsed JSON body.
   * Non-2xx responses throw; a 404 throws NotFoundError.
   */
  async get(path: string): Promise<unknown> {
    const res = await this.fetcher(`${this.baseUrl}/api${path}`, {
      method: 'GET',
      headers: { Accept: 'application/json' },
    })

    const text = await res.text()
    let data: unknown
    try {
      data = JSON.parse(text)
    } catch {
      throw new ApiError(`Invalid response: ${text.slice(0, 200)}`, res.status)
    }

    if (res.status === 404) {
      throw new NotFoundError(errorMessage(data) || 'Not found')
    }
    if (!res.ok) {
      throw new ApiError(errorMessage(data) || 'Request failed', res.status)
    }

    return data
  }
}
