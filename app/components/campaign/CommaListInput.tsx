'use client'
import { useEffect, useState } from 'react'
import { Input } from '../ui'
import { parseCommaList } from '../../utils/listInput'

interface CommaListInputProps {
  label: string
  values: string[]
  onCommit: (values: string[]) => void
  placeholder?: string
}

/** Free-text list editor that only parses on blur so trailing commas survive typing. */
export function CommaListInput({ label, values, onCommit, placeholder }: CommaListInputProps) {
  const [draft, setDraft] = useState(values.join(', '))

  useEffect(() => {
    setDraft(values.join(', '))
  }, [values])

  return (
    <Input
      label={label}
      value={draft}
      placeholder={placeholder}
      onChange={(event) => setDraft(event.target.value)}
      onBlur={() => onCommit(parseCommaList(draft))}
    />
  )
}
