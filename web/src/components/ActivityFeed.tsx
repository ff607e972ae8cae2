import Link from 'next/link'
import ProfileAvatar from '@/components/ProfileAvatar'
import type { MessageEntry } from '@/lib/store'
import { timeAgo } from '@/lib/time'

export default function ActivityFeed({ messages, viewerId, showRoom = true }: {
  messages: MessageEntry[]
  viewerId: string | null
  showRoom?: boolean
}) {
  if (messages.length === 0) {
    return <p className="text-muted text-xs py-4 text-center">No activity yet</p>
  }

  return (
    <div className="bg-surface border border-border rounded-lg divide-y divide-border">
      {messages.map(message => (
        <div key={message.id} className="p-3">
          <div className="flex items-center justify-between text-xs text-muted">
            <Link href={`/profile/${message.user.id}`} className="flex items-center gap-2 hover:text-foreground">
              <ProfileAvatar image={message.user.avatar} name={message.user.name} size={20} />
              @{message.user.name}
            </Link>
            <div className="flex items-center gap-2">
              <span>{timeAgo(message.createdAt)}</span>
              {viewerId === message.userId && (
                <Link href={`/message/delete/${message.id}`} className="text-error">Delete</Link>
              )}
            </div>
          </div>
          {showRoom && (
            <p className="text-xs text-subtle mt-1">
              replied to <Link href={`/room/${message.room.id}`} className="text-accent">{message.room.name}</Link>
            </p>
          )}
          <p className="text-sm text-foreground mt-1 whitespace-pre-wrap">{message.body}</p>
        </div>
      ))}
    </div>
  )
}
