import type { Metadata } from 'next'
import { redirect } from 'next/navigation'
import { isSignedIn } from '@/lib/identity'
import { getIdentity } from '@/lib/session'
import RegisterForm from './RegisterForm'

export const metadata: Metadata = {
  title: 'Sign Up',
}

export const dynamic = 'force-dynamic'

export default async function RegisterPage() {
  if (isSignedIn(await getIdentity())) redirect('/')

  return (
    <div className="min-h-screen bg-surface flex items-center justify-center">
      <div className="bg-background rounded-lg p-8 max-w-md w-full mx-4 border border-border">
        <RegisterForm />
      </div>
    </div>
  )
}
