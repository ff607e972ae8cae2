// Accounts: registration, sign-in checks and self-service profiles

import bcrypt from 'bcryptjs'
import { requireUser } from './access'
import type { LoginFailure } from './login-errors'
import type { Identity } from './identity'
import { invalid, notFound, ok, type Result } from './result'
import { messagesBy, roomsHostedBy } from './search'
import {
  UniqueViolationError,
  type MessageEntry,
  type RoomListing,
  type Store,
  type TopicWithCount,
  type User,
  type UserSummary,
} from './store'

export const REGISTRATION_FAILED = 'An error occurred during registration'
export const MIN_PASSWORD_LENGTH = 8

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

export interface RegistrationForm {
  name: string
  email: string
  password: string
  confirmPassword: string
}

export interface ProfileForm {
  name: string
  email: string
  bio: string
  avatar: string
}

export interface PublicUser {
  id: string
  name: string
  avatar: string | null
  bio: string | null
  joinedAt: Date
}

export interface Profile {
  user: PublicUser
  rooms: RoomListing[]
  messages: MessageEntry[]
  topics: TopicWithCount[]
}

export type CredentialCheck =
  | { ok: true; user: User }
  | { ok: false; reason: LoginFailure }

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase()
}

function bcryptRounds(): number {
  const rounds = Number(process.env.BCRYPT_ROUNDS)
  return Number.isInteger(rounds) && rounds > 0 ? rounds : 12
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, bcryptRounds())
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value)
    return url.protocol === 'http:' || url.protocol === 'https:'
  } catch {
    return false
  }
}

function checkName(name: string, fields: Record<string, string>) {
  if (!name.trim()) fields.name = 'Name is required'
  else if (name.length > 200) fields.name = 'Name must be at most 200 characters'
}

function checkEmail(email: string, fields: Record<string, string>) {
  if (!EMAIL_PATTERN.test(email)) fields.email = 'Enter a valid email address'
}

/**
 * Creates an account. Nothing is written unless every field is valid.
 */
export async function registerUser(store: Store, form: RegistrationForm): Promise<Result<User>> {
  const email = normalizeEmail(form.email)
  const fields: Record<string, string> = {}

  checkName(form.name, fields)
  checkEmail(email, fields)

  if (form.password.length < MIN_PASSWORD_LENGTH) {
    fields.password = `Password must be at least ${MIN_PASSWORD_LENGTH} characters`
  } else if (/^\d+$/.test(form.password)) {
    fields.password = 'Password cannot be entirely numeric'
  }
  if (form.password !== form.confirmPassword) {
    fields.confirmPassword = "The two password fields didn't match"
  }

  if (Object.keys(fields).length > 0) return invalid(REGISTRATION_FAILED, fields)

  const existing = await store.findUserByEmail(email)
  if (existing) {
    return invalid(REGISTRATION_FAILED, { email: 'An account with this email already exists' })
  }

  try {
    const user = await store.createUser({
      email,
      name: form.name.trim(),
      passwordHash: await hashPassword(form.password),
    })
    return ok(user)
  } catch (error) {
    if (error instanceof UniqueViolationError) {
      return invalid(REGISTRATION_FAILED, { email: 'An account with this email already exists' })
    }
    throw error
  }
}

/**
 * Checks an email/password pair. An unknown email stops here and never
 * reaches the password comparison.
 */
export async function verifyCredentials(store: Store, email: string, password: string): Promise<CredentialCheck> {
  const user = await store.findUserByEmail(normalizeEmail(email))
  if (!user) return { ok: false, reason: 'unknown-user' }

  const valid = await bcrypt.compare(password, user.passwordHash)
  if (!valid) return { ok: false, reason: 'bad-password' }

  return { ok: true, user }
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    name: user.name,
    avatar: user.avatar,
    bio: user.bio,
    joinedAt: user.createdAt,
  }
}

/**
 * The signed-in user as the header shows them, read from the store on every
 * request so profile edits appear without signing in again.
 */
export async function getViewer(store: Store, identity: Identity): Promise<UserSummary | null> {
  if (identity.kind !== 'user') return null
  const user = await store.findUserById(identity.id)
  return user ? { id: user.id, name: user.name, avatar: user.avatar } : null
}

export async function getProfile(store: Store, userId: string): Promise<Result<Profile>> {
  const user = await store.findUserById(userId)
  if (!user) return notFound('user')

  const [rooms, messages, topics] = await Promise.all([
    store.findRooms(roomsHostedBy(user.id)),
    store.findMessages(messagesBy(user.id)),
    store.findTopics(),
  ])
  return ok({ user: toPublicUser(user), rooms, messages, topics })
}

/**
 * Updates the acting user's own profile; there is no way to target anyone else.
 */
export async function updateProfile(store: Store, identity: Identity, form: ProfileForm): Promise<Result<User>> {
  const auth = requireUser(identity)
  if (!auth.ok) return auth

  const email = normalizeEmail(form.email)
  const avatar = form.avatar.trim()
  const fields: Record<string, string> = {}

  checkName(form.name, fields)
  checkEmail(email, fields)
  if (avatar && !isHttpUrl(avatar)) fields.avatar = 'Avatar must be an http(s) URL'

  if (Object.keys(fields).length > 0) return invalid('Please correct the errors below', fields)

  const holder = await store.findUserByEmail(email)
  if (holder && holder.id !== auth.value.id) {
    return invalid('Please correct the errors below', { email: 'An account with this email already exists' })
  }

  try {
    const user = await store.updateUser(auth.value.id, {
      email,
      name: form.name.trim(),
      bio: form.bio.trim() ? form.bio : null,
      avatar: avatar || null,
    })
    return ok(user)
  } catch (error) {
    if (error instanceof UniqueViolationError) {
      return invalid('Please correct the errors below', { email: 'An account with this email already exists' })
    }
    throw error
  }
}
