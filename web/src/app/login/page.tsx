import { Suspense } from 'react'
import type { Metadata } from 'next'
import { redirect } from 'next/navigation'
import { Spinner } from '@/components/Spinner'
import { isSignedIn } from '@/lib/identity'
import { getIdentity } from '@/lib/session'
import LoginForm from './LoginForm'

export const metadata: Metadata = {
  title: 'Login',
}

export const dynamic = 'force-dynamic'

export default async function LoginPage() {
  if (isSignedIn(await getIdentity())) redirect('/')

  return (
    <div className="min-h-screen bg-surface flex items-center justify-center">
      <div className="bg-background rounded-lg p-8 max-w-md w-full mx-4 border border-border">
        <Suspense fallback={<Spinner label="Loading..." />}>
          <LoginForm />
        </Suspense>
      </div>
    </div>
  )
}
