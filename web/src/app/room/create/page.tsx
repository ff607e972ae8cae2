import type { Metadata } from 'next'
import FrameLayout from '@/components/FrameLayout'
import RoomForm from '@/components/RoomForm'
import { createRoomAction } from '@/app/actions'
import { requireUser } from '@/lib/access'
import { store } from '@/lib/db'
import { settleFailure } from '@/lib/navigation'
import { getIdentity } from '@/lib/session'
import { listAllTopics } from '@/lib/topics'

export const metadata: Metadata = {
  title: 'Create Room',
}

export const dynamic = 'force-dynamic'

export default async function CreateRoomPage() {
  const auth = requireUser(await getIdentity())
  if (!auth.ok) settleFailure(auth.error, '/room/create')

  const topics = await listAllTopics(store)

  return (
    <FrameLayout>
      <h1 className="text-lg font-bold text-foreground mb-4">Create Study Room</h1>
      <RoomForm action={createRoomAction} topics={topics.map(t => t.name)} submitLabel="Create Room" />
    </FrameLayout>
  )
}
