import { topicSearch } from './search'
import type { Store, TopicWithCount } from './store'

// Topics whose name contains q, ignoring case; '' lists them all
export async function listTopics(store: Store, q: string): Promise<TopicWithCount[]> {
  return store.findTopics({ filter: topicSearch(q) })
}

export async function listAllTopics(store: Store): Promise<TopicWithCount[]> {
  return store.findTopics()
}
