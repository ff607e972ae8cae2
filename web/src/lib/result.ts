// Outcome types shared by every domain operation

export type EntityKind = 'room' | 'user' | 'message'

export type Failure =
  | { kind: 'unauthorized' }
  | { kind: 'forbidden'; message: string }
  | { kind: 'not-found'; entity: EntityKind }
  | { kind: 'invalid'; message: string; fields: Record<string, string> }

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Failure }

export const NOT_ALLOWED = 'You are not allowed to do that!'

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function unauthorized<T>(): Result<T> {
  return { ok: false, error: { kind: 'unauthorized' } }
}

export function forbidden<T>(message = NOT_ALLOWED): Result<T> {
  return { ok: false, error: { kind: 'forbidden', message } }
}

export function notFound<T>(entity: EntityKind): Result<T> {
  return { ok: false, error: { kind: 'not-found', entity } }
}

export function invalid<T>(message: string, fields: Record<string, string> = {}): Result<T> {
  return { ok: false, error: { kind: 'invalid', message, fields } }
}
