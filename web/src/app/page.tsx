import Link from 'next/link'
import type { Metadata } from 'next'
import ActivityFeed from '@/components/ActivityFeed'
import FrameLayout from '@/components/FrameLayout'
import RoomFeed from '@/components/RoomFeed'
import SearchBox from '@/components/SearchBox'
import TopicList from '@/components/TopicList'
import { store } from '@/lib/db'
import { isSignedIn } from '@/lib/identity'
import { listHome } from '@/lib/rooms'
import { normalizeQuery } from '@/lib/search'
import { getIdentity } from '@/lib/session'

export const metadata: Metadata = {
  title: 'Agora - Find your people',
}

export const dynamic = 'force-dynamic'

export default async function Home({
  searchParams,
}: {
  searchParams: Promise<{ q?: string | string[] }>
}) {
  const q = normalizeQuery((await searchParams).q)
  const [identity, { rooms, roomCount, topics, messages }] = await Promise.all([
    getIdentity(),
    listHome(store, q),
  ])
  const viewerId = isSignedIn(identity) ? identity.id : null

  return (
    <FrameLayout wide>
      <SearchBox action="/" q={q} placeholder="Search rooms..." />
      <div className="grid gap-6 md:grid-cols-[200px_1fr_260px]">
        <aside>
          <TopicList topics={topics} showMore />
        </aside>

        <section>
          <div className="flex items-center justify-between mb-4">
            <div>
              <h1 className="text-lg font-bold text-foreground">Study Rooms</h1>
              <p className="text-xs text-muted">{roomCount} rooms available</p>
            </div>
            <Link
              href="/room/create"
              className="bg-accent hover:bg-accent-hover text-white text-sm font-semibold px-3 py-1.5 rounded-lg"
            >
              Create Room
            </Link>
          </div>
          <RoomFeed rooms={rooms} viewerId={viewerId} />
        </section>

        <aside>
          <h2 className="text-xs font-semibold text-muted uppercase mb-2">Recent Activities</h2>
          <ActivityFeed messages={messages} viewerId={viewerId} />
        </aside>
      </div>
    </FrameLayout>
  )
}
