export const LOGIN_ERRORS = {
  'unknown-user': 'User does not exist.',
  'bad-password': 'Email or Password does not match',
} as const

export type LoginFailure = keyof typeof LOGIN_ERRORS

const KNOWN_MESSAGES: readonly string[] = Object.values(LOGIN_ERRORS)

/**
 * Turns the `error` next-auth hands back to the sign-in form into text for
 * the user. Messages thrown from `authorize` arrive verbatim; a null return
 * arrives as `CredentialsSignin`.
 */
export function describeLoginError(error: string): string {
  if (KNOWN_MESSAGES.includes(error)) return error
  if (error === 'CredentialsSignin') return LOGIN_ERRORS['bad-password']
  return 'Something went wrong'
}
