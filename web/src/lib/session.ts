import { getServerSession } from 'next-auth'
import { authOptions } from './auth'
import { store } from './db'
import { ANONYMOUS, identityOf, type Identity } from './identity'

/**
 * Resolves the request's session into an Identity. A session whose user no
 * longer exists counts as anonymous.
 */
export async function getIdentity(): Promise<Identity> {
  const session = await getServerSession(authOptions)
  const id = session?.user?.id
  if (!id) return ANONYMOUS

  const user = await store.findUserById(id)
  return user ? identityOf(user) : ANONYMOUS
}
