'use server'

import { redirect } from 'next/navigation'
import { store } from '@/lib/db'
import { readField, readProfileForm, readRoomForm, toFormState, type FormState } from '@/lib/forms'
import { deleteMessage } from '@/lib/messages'
import { settleFailure } from '@/lib/navigation'
import { createRoom, deleteRoom, postMessage, updateRoom } from '@/lib/rooms'
import { getIdentity } from '@/lib/session'
import { updateProfile } from '@/lib/user'

// POST /room/create
export async function createRoomAction(_prev: FormState, formData: FormData): Promise<FormState> {
  const result = await createRoom(store, await getIdentity(), readRoomForm(formData))
  if (!result.ok) {
    if (result.error.kind === 'invalid') return toFormState(result.error)
    settleFailure(result.error, '/room/create')
  }
  redirect('/')
}

// POST /room/update/[id]
export async function updateRoomAction(roomId: string, _prev: FormState, formData: FormData): Promise<FormState> {
  const result = await updateRoom(store, await getIdentity(), roomId, readRoomForm(formData))
  if (!result.ok) {
    if (result.error.kind === 'invalid') return toFormState(result.error)
    settleFailure(result.error, `/room/update/${roomId}`)
  }
  redirect('/')
}

// POST /room/delete/[id] - confirmed deletion
export async function deleteRoomAction(roomId: string): Promise<void> {
  const result = await deleteRoom(store, await getIdentity(), roomId)
  if (!result.ok) settleFailure(result.error, `/room/delete/${roomId}`)
  redirect('/')
}

// POST /message/delete/[id] - confirmed deletion
export async function deleteMessageAction(messageId: string): Promise<void> {
  const result = await deleteMessage(store, await getIdentity(), messageId)
  if (!result.ok) settleFailure(result.error, `/message/delete/${messageId}`)
  redirect('/')
}

// POST /room/[id] - append a message
export async function postMessageAction(roomId: string, formData: FormData): Promise<void> {
  const result = await postMessage(store, await getIdentity(), roomId, readField(formData, 'body'))
  // An empty body just returns to the room
  if (!result.ok && result.error.kind !== 'invalid') settleFailure(result.error, `/room/${roomId}`)
  redirect(`/room/${roomId}`)
}

// POST /profile/update
export async function updateProfileAction(_prev: FormState, formData: FormData): Promise<FormState> {
  const result = await updateProfile(store, await getIdentity(), readProfileForm(formData))
  if (!result.ok) {
    if (result.error.kind === 'invalid') return toFormState(result.error)
    settleFailure(result.error, '/profile/update')
  }
  redirect(`/profile/${result.value.id}`)
}
