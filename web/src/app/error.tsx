'use client'

import { useEffect } from 'react'
import Link from 'next/link'
import { errorNotice } from '@/lib/error-notice'

export default function RoomError({
  error,
  reset,
}: {
  error: Error & { digest?: string }
  reset: () => void
}) {
  useEffect(() => {
    console.error('Render error:', error)
  }, [error])

  const notice = errorNotice(error)

  return (
    <div className="min-h-screen bg-background px-4 py-16">
      <section className="max-w-lg mx-auto bg-surface border border-border rounded-xl p-6">
        <h1 className="text-xl font-semibold text-foreground">{notice.heading}</h1>
        <p className="text-muted text-sm mt-2">{notice.detail}</p>

        <div className="flex items-center gap-3 mt-6">
          <button
            onClick={reset}
            className="bg-accent hover:bg-accent-hover text-white text-sm px-4 py-2 rounded-lg"
          >
            Reload
          </button>
          <Link href="/" className="text-sm text-muted hover:text-foreground">
            Back to rooms
          </Link>
          <Link href="/activity" className="text-sm text-muted hover:text-foreground">
            Recent activity
          </Link>
        </div>

        {notice.reference && (
          <p className="text-subtle text-xs mt-6 font-mono">{notice.reference}</p>
        )}
      </section>
    </div>
  )
}
