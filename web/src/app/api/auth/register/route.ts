import { NextRequest, NextResponse } from 'next/server'
import { store } from '@/lib/db'
import { registerUser } from '@/lib/user'

function text(value: unknown): string {
  return typeof value === 'string' ? value : ''
}

// POST /api/auth/register - create an account with email/password
export async function POST(req: NextRequest) {
  try {
    const body: unknown = await req.json().catch(() => null)
    if (!body || typeof body !== 'object') {
      return NextResponse.json({ error: 'Invalid request body' }, { status: 400 })
    }

    const field = (key: string) => text(Reflect.get(body, key))
    const result = await registerUser(store, {
      name: field('name'),
      email: field('email'),
      password: field('password'),
      confirmPassword: field('confirmPassword'),
    })

    if (!result.ok) {
      const { error } = result
      if (error.kind !== 'invalid') throw new Error(`Unexpected registration failure: ${error.kind}`)
      return NextResponse.json({ error: error.message, fields: error.fields }, { status: 400 })
    }

    return NextResponse.json({ success: true, userId: result.value.id }, { status: 201 })
  } catch (error) {
    console.error('Registration error:', error)
    return NextResponse.json({ error: 'Failed to create account' }, { status: 500 })
  }
}
