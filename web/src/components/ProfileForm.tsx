'use client'

import { useActionState } from 'react'
import { EMPTY_FORM_STATE, type FormState } from '@/lib/forms'

interface ProfileFormProps {
  action: (state: FormState, formData: FormData) => Promise<FormState>
  initial: { name: string; email: string; bio: string | null; avatar: string | null }
}

const inputClass =
  'mt-1 w-full bg-surface border border-border rounded-lg px-4 py-2 text-foreground focus:outline-none focus:border-accent'

export default function ProfileForm({ action, initial }: ProfileFormProps) {
  const [state, formAction, pending] = useActionState(action, EMPTY_FORM_STATE)

  return (
    <form action={formAction} className="space-y-4">
      {state.message && (
        <div className="bg-error-bg border border-error text-error text-sm p-3 rounded-lg">
          {state.message}
        </div>
      )}

      <label className="block">
        <span className="text-sm text-muted">Name</span>
        <input name="name" defaultValue={initial.name} required className={inputClass} />
        {state.fields.name && <span className="text-error text-xs">{state.fields.name}</span>}
      </label>

      <label className="block">
        <span className="text-sm text-muted">Email</span>
        <input name="email" type="email" defaultValue={initial.email} required className={inputClass} />
        {state.fields.email && <span className="text-error text-xs">{state.fields.email}</span>}
      </label>

      <label className="block">
        <span className="text-sm text-muted">Avatar URL</span>
        <input name="avatar" type="url" defaultValue={initial.avatar ?? ''} className={inputClass} />
        {state.fields.avatar && <span className="text-error text-xs">{state.fields.avatar}</span>}
      </label>

      <label className="block">
        <span className="text-sm text-muted">Bio</span>
        <textarea name="bio" defaultValue={initial.bio ?? ''} rows={4} className={inputClass} />
      </label>

      <button
        type="submit"
        disabled={pending}
        className="px-4 py-2 rounded-lg bg-accent hover:bg-accent-hover text-white font-semibold disabled:opacity-50"
      >
        {pending ? 'Saving...' : 'Update'}
      </button>
    </form>
  )
}
