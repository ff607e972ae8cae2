import Link from 'next/link'

export default function ConfirmDelete({ label, action, cancelHref }: {
  label: string
  action: () => Promise<void>
  cancelHref: string
}) {
  return (
    <div className="bg-surface border border-border rounded-lg p-6">
      <h1 className="text-lg font-semibold text-foreground mb-4">
        Are you sure you want to delete &quot;{label}&quot;?
      </h1>
      <form action={action} className="flex gap-3">
        <Link
          href={cancelHref}
          className="px-4 py-2 rounded-lg border border-border text-foreground hover:bg-background"
        >
          Go Back
        </Link>
        <button type="submit" className="px-4 py-2 rounded-lg bg-error text-white font-medium">
          Confirm
        </button>
      </form>
    </div>
  )
}
