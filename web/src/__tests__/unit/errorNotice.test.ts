import { describe, it, expect } from 'vitest'
import { errorNotice } from '@/lib/error-notice'

describe('errorNotice', () => {
  it('shows the digest of a server error as its reference', () => {
    const notice = errorNotice(Object.assign(new Error('An error occurred in the Server Components render.'), { digest: '2781461254' }))

    expect(notice.heading).toBe('The server hit a snag')
    expect(notice.reference).toBe('Reference 2781461254')
  })

  it('has no reference for an error raised in the browser', () => {
    expect(errorNotice(new Error('x is undefined'))).toEqual({
      heading: 'This page stopped working',
      detail: 'Something broke while the page was running in your browser. Reloading it usually helps.',
      reference: null,
    })
  })
})
