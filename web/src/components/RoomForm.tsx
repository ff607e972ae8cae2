'use client'

import { useActionState } from 'react'
import Link from 'next/link'
import { EMPTY_FORM_STATE, type FormState } from '@/lib/forms'

interface RoomFormProps {
  action: (state: FormState, formData: FormData) => Promise<FormState>
  topics: string[]
  initial?: { topic: string; name: string; description: string | null }
  submitLabel: string
}

export default function RoomForm({ action, topics, initial, submitLabel }: RoomFormProps) {
  const [state, formAction, pending] = useActionState(action, EMPTY_FORM_STATE)

  return (
    <form action={formAction} className="space-y-4">
      {state.message && (
        <div className="bg-error-bg border border-error text-error text-sm p-3 rounded-lg">
          {state.message}
        </div>
      )}

      <label className="block">
        <span className="text-sm text-muted">Topic</span>
        <input
          name="topic"
          list="topic-list"
          defaultValue={initial?.topic}
          required
          className="mt-1 w-full bg-surface border border-border rounded-lg px-4 py-2 text-foreground focus:outline-none focus:border-accent"
        />
        <datalist id="topic-list">
          {topics.map(name => <option key={name} value={name} />)}
        </datalist>
        {state.fields.topic && <span className="text-error text-xs">{state.fields.topic}</span>}
      </label>

      <label className="block">
        <span className="text-sm text-muted">Room Name</span>
        <input
          name="name"
          defaultValue={initial?.name}
          required
          maxLength={200}
          className="mt-1 w-full bg-surface border border-border rounded-lg px-4 py-2 text-foreground focus:outline-none focus:border-accent"
        />
        {state.fields.name && <span className="text-error text-xs">{state.fields.name}</span>}
      </label>

      <label className="block">
        <span className="text-sm text-muted">Room Description</span>
        <textarea
          name="description"
          defaultValue={initial?.description ?? ''}
          rows={4}
          className="mt-1 w-full bg-surface border border-border rounded-lg px-4 py-2 text-foreground focus:outline-none focus:border-accent"
        />
      </label>

      <div className="flex gap-3">
        <Link href="/" className="px-4 py-2 rounded-lg border border-border text-foreground">
          Cancel
        </Link>
        <button
          type="submit"
          disabled={pending}
          className="px-4 py-2 rounded-lg bg-accent hover:bg-accent-hover text-white font-semibold disabled:opacity-50"
        >
          {submitLabel}
        </button>
      </div>
    </form>
  )
}
