'use client'

import { useState } from 'react'
import { signIn } from 'next-auth/react'
import { useRouter } from 'next/navigation'
import Link from 'next/link'

type Fields = Record<string, string>

const inputClass =
  'w-full bg-surface border border-border rounded-lg px-4 py-2.5 text-foreground focus:outline-none focus:border-accent'

export default function RegisterForm() {
  const router = useRouter()
  const [form, setForm] = useState({ name: '', email: '', password: '', confirmPassword: '' })
  const [error, setError] = useState('')
  const [fields, setFields] = useState<Fields>({})
  const [loading, setLoading] = useState(false)

  const update = (key: keyof typeof form) => (e: React.ChangeEvent<HTMLInputElement>) =>
    setForm(prev => ({ ...prev, [key]: e.target.value }))

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault()
    setError('')
    setFields({})
    setLoading(true)

    try {
      const res = await fetch('/api/auth/register', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(form),
      })
      const data: { error?: string; fields?: Fields } = await res.json()

      if (!res.ok) {
        setError(data.error || 'Failed to create account')
        setFields(data.fields || {})
        return
      }

      // Registration succeeded; start the session with the same credentials
      const result = await signIn('credentials', {
        email: form.email,
        password: form.password,
        redirect: false,
      })
      if (result?.error) {
        router.push('/login')
      } else {
        router.push('/')
        router.refresh()
      }
    } catch {
      setError('Something went wrong')
    } finally {
      setLoading(false)
    }
  }

  return (
    <>
      <h1 className="text-2xl font-bold text-foreground text-center mb-8">Sign Up</h1>

      {error && (
        <div className="bg-error-bg border border-error text-error text-sm p-3 rounded-lg mb-4">
          {error}
        </div>
      )}

      <form onSubmit={handleSubmit} className="space-y-4">
        <div>
          <input value={form.name} onChange={update('name')} required placeholder="Name" className={inputClass} />
          {fields.name && <span className="text-error text-xs">{fields.name}</span>}
        </div>
        <div>
          <input type="email" value={form.email} onChange={update('email')} required placeholder="Email" className={inputClass} />
          {fields.email && <span className="text-error text-xs">{fields.email}</span>}
        </div>
        <div>
          <input type="password" value={form.password} onChange={update('password')} required placeholder="Password" className={inputClass} />
          {fields.password && <span className="text-error text-xs">{fields.password}</span>}
        </div>
        <div>
          <input type="password" value={form.confirmPassword} onChange={update('confirmPassword')} required placeholder="Confirm password" className={inputClass} />
          {fields.confirmPassword && <span className="text-error text-xs">{fields.confirmPassword}</span>}
        </div>
        <button
          type="submit"
          disabled={loading}
          className="w-full bg-accent hover:bg-accent-hover text-white font-semibold py-3 rounded-lg transition-colors disabled:opacity-50"
        >
          {loading ? 'Creating account...' : 'Sign Up'}
        </button>
      </form>

      <div className="mt-4 text-sm text-center text-muted">
        Already signed up?{' '}
        <Link href="/login" className="text-accent hover:text-accent-hover">
          Login
        </Link>
      </div>
    </>
  )
}
