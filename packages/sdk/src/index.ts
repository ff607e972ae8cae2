import { HTTPClient } from './client'
import { parseRoom, parseRooms, parseStrings } from './parse'
import type { AgoraConfig, Room } from './types'

export { ApiError, NotFoundError } from './errors'
export * from './types'

/**
 * Client for the forum's read-only JSON API.
 *
 * ```ts
 * const agora = new AgoraClient({ baseUrl: 'http://localhost:3000' })
 * const rooms = await agora.listRooms()
 * ```
 */
export class AgoraClient {
  private http: HTTPClient

  constructor(config: AgoraConfig) {
    this.http = new HTTPClient(config.baseUrl, config.fetch)
  }

  // ── Discovery ──

  async listRoutes(): Promise<string[]> {
    return parseStrings(await this.http.get(''))
  }

  // ── Rooms ──

  async listRooms(): Promise<Room[]> {
    return parseRooms(await this.http.get('/rooms'))
  }

  /** Throws NotFoundError for an unknown id */
  async getRoom(id: string): Promise<Room> {
    return parseRoom(await this.http.get(`/rooms/${encodeURIComponent(id)}`))
  }
}
