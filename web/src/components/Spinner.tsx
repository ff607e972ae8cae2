export function Spinner({ label, fullPage = false }: { label?: string; fullPage?: boolean }) {
  const spinner = (
    <div className="flex flex-col items-center gap-3" role="status">
      <div className="w-8 h-8 border-2 border-border border-t-accent rounded-full animate-spin" />
      {label && <p className="text-muted text-sm">{label}</p>}
    </div>
  )

  return fullPage ? <div className="flex items-center justify-center py-20">{spinner}</div> : spinner
}
