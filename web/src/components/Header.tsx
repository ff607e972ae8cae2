import Link from 'next/link'
import ProfileAvatar from '@/components/ProfileAvatar'
import type { UserSummary } from '@/lib/store'

const navLinks = [
  { href: '/topics', label: 'Topics' },
  { href: '/activity', label: 'Activity' },
]

export default function Header({ viewer }: { viewer: UserSummary | null }) {
  return (
    <header className="border-b border-border bg-surface">
      <div className="max-w-5xl mx-auto px-4 h-14 flex items-center justify-between">
        <Link href="/" className="font-bold text-foreground">
          Agora
        </Link>

        <nav className="flex items-center gap-4 text-sm">
          {navLinks.map(link => (
            <Link key={link.href} href={link.href} className="text-muted hover:text-foreground">
              {link.label}
            </Link>
          ))}

          {viewer ? (
            <>
              <Link href="/room/create" className="text-accent hover:text-accent-hover">
                Create Room
              </Link>
              <Link href={`/profile/${viewer.id}`} className="flex items-center gap-2">
                <ProfileAvatar image={viewer.avatar} name={viewer.name} size={28} />
                <span className="text-foreground">{viewer.name}</span>
              </Link>
              <Link href="/logout" className="text-muted hover:text-foreground">
                Logout
              </Link>
            </>
          ) : (
            <Link href="/login" className="text-accent hover:text-accent-hover">
              Login
            </Link>
          )}
        </nav>
      </div>
    </header>
  )
}
