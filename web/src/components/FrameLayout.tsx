import Header from '@/components/Header'
import { store } from '@/lib/db'
import { getIdentity } from '@/lib/session'
import { getViewer } from '@/lib/user'

export default async function FrameLayout({ children, wide = false }: {
  children: React.ReactNode
  wide?: boolean
}) {
  const viewer = await getViewer(store, await getIdentity())

  return (
    <div className="min-h-screen bg-background">
      <Header viewer={viewer} />
      <main className={`${wide ? 'max-w-5xl' : 'max-w-2xl'} mx-auto px-4 py-6`}>
        {children}
      </main>
    </div>
  )
}
