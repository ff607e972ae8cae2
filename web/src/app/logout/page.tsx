'use client'

import { useEffect } from 'react'
import { signOut } from 'next-auth/react'
import { Spinner } from '@/components/Spinner'

// GET /logout - clears the session and returns home
export default function LogoutPage() {
  useEffect(() => {
    signOut({ callbackUrl: '/' }).catch((error: unknown) => {
      console.error('Sign out error:', error)
    })
  }, [])

  return <Spinner label="Signing out" fullPage />
}
