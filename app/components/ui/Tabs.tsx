'use client'
import React from 'react'
import { cn } from '../../utils/cn'

export interface TabItem<K extends string> {
  key: K
  label: string
}

interface TabsProps<K extends string> {
  tabs: ReadonlyArray<TabItem<K>>
  active: K
  onChange: (key: K) => void
}

export function Tabs<K extends string>({ tabs, active, onChange }: TabsProps<K>) {
  return (
    <div role="tablist" className="flex flex-wrap gap-1 border-b border-neutral-200">
      {tabs.map((tab) => (
        <button
          key={tab.key}
          type="button"
          role="tab"
          aria-selected={tab.key === active}
          onClick={() => onChange(tab.key)}
          className={cn(
            'px-3 py-2 text-sm font-medium rounded-t-md transition-colors',
            tab.key === active
              ? 'bg-white border border-b-white border-neutral-200 text-primary-600 -mb-px'
              : 'text-neutral-600 hover:text-primary-600 hover:bg-primary-50',
          )}
        >
          {tab.label}
        </button>
      ))}
    </div>
  )
}
