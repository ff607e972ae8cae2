import { authorizeMessageAuthor } from './access'
import type { Identity } from './identity'
import { ok, type Result } from './result'
import { matchAll } from './search'
import type { Message, MessageEntry, Store } from './store'

/** Every message on the site, newest first */
export async function listActivity(store: Store): Promise<MessageEntry[]> {
  return store.findMessages(matchAll())
}

export async function deleteMessage(store: Store, identity: Identity, messageId: string): Promise<Result<Message>> {
  const access = await authorizeMessageAuthor(store, identity, messageId)
  if (!access.ok) return access

  await store.deleteMessage(access.value.message.id)
  return ok(access.value.message)
}
