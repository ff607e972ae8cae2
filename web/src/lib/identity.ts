import type { User } from './store'

/**
 * Who is acting on a request. Resolved once at the request boundary and
 * passed explicitly into every operation.
 */
export type Identity =
  | { kind: 'user'; id: string; email: string; name: string }
  | { kind: 'anonymous' }

export type UserIdentity = Extract<Identity, { kind: 'user' }>

export const ANONYMOUS: Identity = { kind: 'anonymous' }

export function identityOf(user: Pick<User, 'id' | 'email' | 'name'>): UserIdentity {
  return { kind: 'user', id: user.id, email: user.email, name: user.name }
}

export function isSignedIn(identity: Identity): identity is UserIdentity {
  return identity.kind === 'user'
}
