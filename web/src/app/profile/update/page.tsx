import type { Metadata } from 'next'
import FrameLayout from '@/components/FrameLayout'
import ProfileForm from '@/components/ProfileForm'
import { updateProfileAction } from '@/app/actions'
import { requireUser } from '@/lib/access'
import { store } from '@/lib/db'
import { settleFailure } from '@/lib/navigation'
import { getIdentity } from '@/lib/session'

export const metadata: Metadata = {
  title: 'Edit Profile',
}

export const dynamic = 'force-dynamic'

export default async function UpdateProfilePage() {
  const auth = requireUser(await getIdentity())
  if (!auth.ok) settleFailure(auth.error, '/profile/update')

  const user = await store.findUserById(auth.value.id)
  if (!user) settleFailure({ kind: 'unauthorized' }, '/profile/update')

  return (
    <FrameLayout>
      <h1 className="text-lg font-bold text-foreground mb-4">Edit your profile</h1>
      <ProfileForm
        action={updateProfileAction}
        initial={{ name: user.name, email: user.email, bio: user.bio, avatar: user.avatar }}
      />
    </FrameLayout>
  )
}
