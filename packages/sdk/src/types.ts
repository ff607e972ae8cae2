// ── Config ──

export interface AgoraConfig {
  baseUrl: string
  /** Defaults to the global fetch */
  fetch?: typeof fetch
}

// ── Rooms ──

export interface Room {
  id: string
  /** Id of the hosting user */
  host: string
  /** Id of the room's topic */
  topic: string
  name: string
  description: string | null
  /** Ids of users who have posted in the room */
  participants: string[]
  /** ISO-8601 timestamps */
  updated: string
  created: string
}
