import type { NextAuthOptions } from 'next-auth'
import CredentialsProvider from 'next-auth/providers/credentials'
import { store } from './db'
import { LOGIN_ERRORS } from './login-errors'
import { verifyCredentials } from './user'

export const authOptions: NextAuthOptions = {
  providers: [
    // Email/password credentials
    CredentialsProvider({
      name: 'Email',
      credentials: {
        email: { label: 'Email', type: 'email' },
        password: { label: 'Password', type: 'password' },
      },
      async authorize(credentials) {
        if (!credentials?.email || !credentials?.password) return null

        const check = await verifyCredentials(store, credentials.email, credentials.password)

        // Thrown messages reach the sign-in form as `error`
        if (!check.ok) throw new Error(LOGIN_ERRORS[check.reason])

        const { user } = check
        return { id: user.id, email: user.email, name: user.name, image: user.avatar }
      },
    }),
  ],
  session: {
    strategy: 'jwt',
  },
  callbacks: {
    async jwt({ token, user }) {
      if (user) {
        token.id = user.id
        token.sub = user.id
      }
      return token
    },
    async session({ session, token }) {
      const id = token.sub ?? token.id
      if (session.user && id) {
        session.user.id = id
      }
      return session
    },
  },
  pages: {
    signIn: '/login',
  },
}
