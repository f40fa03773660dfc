'use client'

export default function Footer() {
  return (
    <footer className="bg-white border-t border-neutral-200 mt-auto">
      <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-6 flex flex-col sm:flex-row justify-between gap-2">
        <p className="text-sm text-neutral-600 max-w-md leading-relaxed">
          Describe directed-evolution campaigns as structured, portable documents.
        </p>
        <p className="text-xs text-neutral-500">
          Session data stays in this browser until you export it as JSON or YAML.
        </p>
      </div>
    </footer>
  )
}
