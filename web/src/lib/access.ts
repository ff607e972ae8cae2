import { isSignedIn, type Identity, type UserIdentity } from './identity'
import { forbidden, notFound, ok, unauthorized, type Result } from './result'
import type { Message, RoomListing, Store } from './store'

// Operations that need a signed-in user. Middleware redirects anonymous
// requests for these paths; the operations check again themselves.
export const AUTH_REQUIRED_PATHS = [
  '/room/create',
  '/room/update/',
  '/room/delete/',
  '/message/delete/',
  '/profile/update',
]

export function requiresAuth(pathname: string): boolean {
  return AUTH_REQUIRED_PATHS.some(p => (p.endsWith('/') ? pathname.startsWith(p) : pathname === p))
}

export function loginUrl(next?: string): string {
  return next ? `/login?next=${encodeURIComponent(next)}` : '/login'
}

export function requireUser(identity: Identity): Result<UserIdentity> {
  return isSignedIn(identity) ? ok(identity) : unauthorized()
}

/**
 * Passes only when the acting user hosts the room.
 * Checks sign-in first, then existence, then ownership.
 */
export async function authorizeRoomHost(
  store: Store,
  identity: Identity,
  roomId: string
): Promise<Result<{ user: UserIdentity; room: RoomListing }>> {
  const auth = requireUser(identity)
  if (!auth.ok) return auth

  const room = await store.findRoom(roomId)
  if (!room) return notFound('room')

  if (room.hostId !== auth.value.id) return forbidden()

  return ok({ user: auth.value, room })
}

/**
 * Passes only when the acting user wrote the message.
 */
export async function authorizeMessageAuthor(
  store: Store,
  identity: Identity,
  messageId: string
): Promise<Result<{ user: UserIdentity; message: Message }>> {
  const auth = requireUser(identity)
  if (!auth.ok) return auth

  const message = await store.findMessage(messageId)
  if (!message) return notFound('message')

  if (message.userId !== auth.value.id) return forbidden()

  return ok({ user: auth.value, message })
}
