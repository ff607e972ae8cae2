// Plain GET form so search works without client JS
export default function SearchBox({ action, q, placeholder }: {
  action: string
  q: string
  placeholder: string
}) {
  return (
    <form action={action} method="get" className="mb-4">
      <input
        type="search"
        name="q"
        defaultValue={q}
        placeholder={placeholder}
        className="w-full bg-surface border border-border rounded-lg px-4 py-2 text-foreground focus:outline-none focus:border-accent"
      />
    </form>
  )
}
