import type { Metadata } from 'next'
import FrameLayout from '@/components/FrameLayout'
import SearchBox from '@/components/SearchBox'
import TopicList from '@/components/TopicList'
import { store } from '@/lib/db'
import { normalizeQuery } from '@/lib/search'
import { listTopics } from '@/lib/topics'

export const metadata: Metadata = {
  title: 'Topics',
}

export const dynamic = 'force-dynamic'

export default async function TopicsPage({
  searchParams,
}: {
  searchParams: Promise<{ q?: string | string[] }>
}) {
  const q = normalizeQuery((await searchParams).q)
  const topics = await listTopics(store, q)

  return (
    <FrameLayout>
      <SearchBox action="/topics" q={q} placeholder="Search for topics..." />
      <TopicList topics={topics} />
    </FrameLayout>
  )
}
