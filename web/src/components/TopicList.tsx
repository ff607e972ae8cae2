import Link from 'next/link'
import type { TopicWithCount } from '@/lib/store'

export default function TopicList({ topics, showMore = false }: {
  topics: TopicWithCount[]
  showMore?: boolean
}) {
  return (
    <div className="bg-surface border border-border rounded-lg p-3">
      <h2 className="text-xs font-semibold text-muted uppercase mb-2">Browse Topics</h2>
      <ul className="space-y-1 text-sm">
        <li>
          <Link href="/" className="text-foreground hover:text-accent">All</Link>
        </li>
        {topics.map(topic => (
          <li key={topic.id} className="flex justify-between">
            <Link href={`/?q=${encodeURIComponent(topic.name)}`} className="text-foreground hover:text-accent">
              {topic.name}
            </Link>
            <span className="text-subtle font-mono">{topic.roomCount}</span>
          </li>
        ))}
      </ul>
      {showMore && (
        <Link href="/topics" className="block mt-2 text-xs text-accent hover:text-accent-hover">
          More topics
        </Link>
      )}
    </div>
  )
}
