export interface ErrorNotice {
  heading: string
  detail: string
  reference: string | null
}

/**
 * What the error boundary tells the reader. Errors thrown on the server reach
 * the browser with their message stripped, so only the digest is shown.
 */
export function errorNotice(error: Error & { digest?: string }): ErrorNotice {
  if (error.digest) {
    return {
      heading: 'The server hit a snag',
      detail: 'Your last change may not have been saved. Reload the page to check before posting again.',
      reference: `Reference ${error.digest}`,
    }
  }
  return {
    heading: 'This page stopped working',
    detail: 'Something broke while the page was running in your browser. Reloading it usually helps.',
    reference: null,
  }
}
