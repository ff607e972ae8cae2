import { forbidden, notFound, redirect } from 'next/navigation'
import { loginUrl } from './access'
import type { Failure } from './result'

/**
 * Ends a page render or server action for a failed operation:
 * sign-in redirect, 403 page, or 404 page.
 */
export function settleFailure(failure: Failure, next?: string): never {
  switch (failure.kind) {
    case 'unauthorized':
      return redirect(loginUrl(next))
    case 'forbidden':
      return forbidden()
    case 'not-found':
      return notFound()
    case 'invalid':
      throw new Error(failure.message)
  }
}
