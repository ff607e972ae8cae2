import Link from 'next/link'
import { NOT_ALLOWED } from '@/lib/result'

// Rendered with a 403 when an action targets someone else's room or message
export default function Forbidden() {
  return (
    <div className="min-h-screen bg-surface flex items-center justify-center">
      <div className="text-center px-6">
        <div className="text-8xl font-bold text-border mb-4">403</div>
        <h1 className="text-2xl font-bold text-foreground mb-8">{NOT_ALLOWED}</h1>
        <Link
          href="/"
          className="bg-accent hover:bg-accent-hover text-white px-6 py-2 rounded-lg font-medium transition-colors"
        >
          Go Home
        </Link>
      </div>
    </div>
  )
}
