import type { Failure } from './result'
import type { RoomForm } from './rooms'
import type { ProfileForm } from './user'

export interface FormState {
  message: string | null
  fields: Record<string, string>
}

export const EMPTY_FORM_STATE: FormState = { message: null, fields: {} }

// Files are never expected here; treat them as empty
export function readField(formData: FormData, name: string): string {
  const value = formData.get(name)
  return typeof value === 'string' ? value : ''
}

export function readRoomForm(formData: FormData): RoomForm {
  return {
    topic: readField(formData, 'topic'),
    name: readField(formData, 'name'),
    description: readField(formData, 'description'),
  }
}

export function readProfileForm(formData: FormData): ProfileForm {
  return {
    name: readField(formData, 'name'),
    email: readField(formData, 'email'),
    bio: readField(formData, 'bio'),
    avatar: readField(formData, 'avatar'),
  }
}

export function toFormState(failure: Extract<Failure, { kind: 'invalid' }>): FormState {
  return { message: failure.message, fields: failure.fields }
}
