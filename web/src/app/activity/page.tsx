import type { Metadata } from 'next'
import ActivityFeed from '@/components/ActivityFeed'
import FrameLayout from '@/components/FrameLayout'
import { store } from '@/lib/db'
import { isSignedIn } from '@/lib/identity'
import { listActivity } from '@/lib/messages'
import { getIdentity } from '@/lib/session'

export const metadata: Metadata = {
  title: 'Recent Activities',
}

export const dynamic = 'force-dynamic'

export default async function ActivityPage() {
  const [identity, messages] = await Promise.all([getIdentity(), listActivity(store)])

  return (
    <FrameLayout>
      <h1 className="text-lg font-bold text-foreground mb-4">Recent Activities</h1>
      <ActivityFeed messages={messages} viewerId={isSignedIn(identity) ? identity.id : null} />
    </FrameLayout>
  )
}
