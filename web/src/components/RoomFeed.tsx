import Link from 'next/link'
import ProfileAvatar from '@/components/ProfileAvatar'
import type { RoomListing } from '@/lib/store'
import { timeAgo } from '@/lib/time'

export default function RoomFeed({ rooms, viewerId }: {
  rooms: RoomListing[]
  viewerId: string | null
}) {
  if (rooms.length === 0) {
    return <p className="text-muted text-sm py-6 text-center">No rooms found</p>
  }

  return (
    <div className="space-y-2">
      {rooms.map(room => (
        <div key={room.id} className="bg-surface border border-border rounded-lg p-3">
          <div className="flex items-center justify-between text-xs text-muted">
            <Link href={`/profile/${room.host.id}`} className="flex items-center gap-2 hover:text-foreground">
              <ProfileAvatar image={room.host.avatar} name={room.host.name} size={20} />
              @{room.host.name}
            </Link>
            <span>{timeAgo(room.createdAt)}</span>
          </div>
          <Link href={`/room/${room.id}`} className="block mt-2 font-semibold text-foreground hover:text-accent">
            {room.name}
          </Link>
          <div className="flex items-center justify-between mt-2 text-xs">
            <span className="text-muted">{room.participantIds.length} joined</span>
            <div className="flex items-center gap-3">
              {viewerId === room.hostId && (
                <>
                  <Link href={`/room/update/${room.id}`} className="text-muted hover:text-foreground">Edit</Link>
                  <Link href={`/room/delete/${room.id}`} className="text-error">Delete</Link>
                </>
              )}
              <span className="bg-background border border-border rounded px-1.5 py-0.5">{room.topic.name}</span>
            </div>
          </div>
        </div>
      ))}
    </div>
  )
}
