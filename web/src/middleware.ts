import { NextRequest, NextResponse } from 'next/server'
import { getToken } from 'next-auth/jwt'
import { loginUrl, requiresAuth } from '@/lib/access'

const MUTATION_METHODS = ['POST', 'PUT', 'PATCH', 'DELETE']

// NextAuth's own endpoints carry their CSRF token
const CSRF_EXEMPT = /^\/api\/auth\/(?!register$)/

export async function middleware(req: NextRequest) {
  const { pathname } = req.nextUrl

  // ── Sign-in gate for owner-only pages ──
  if (requiresAuth(pathname)) {
    const token = await getToken({ req, secret: process.env.NEXTAUTH_SECRET })
    if (!token) {
      return NextResponse.redirect(new URL(loginUrl(pathname), req.url))
    }
    return NextResponse.next()
  }

  // ── CSRF protection for API mutations ──
  if (MUTATION_METHODS.includes(req.method) && pathname.startsWith('/api/')) {
    if (CSRF_EXEMPT.test(pathname)) {
      return NextResponse.next()
    }

    const origin = req.headers.get('origin')
    if (!origin) {
      return NextResponse.json({ error: 'Forbidden: missing origin' }, { status: 403 })
    }

    if (origin !== req.nextUrl.origin) {
      return NextResponse.json({ error: 'Forbidden: origin mismatch' }, { status: 403 })
    }
  }

  return NextResponse.next()
}

export const config = {
  matcher: [
    '/room/create',
    '/room/update/:path*',
    '/room/delete/:path*',
    '/message/delete/:path*',
    '/profile/update',
    '/api/:path*',
  ],
}
