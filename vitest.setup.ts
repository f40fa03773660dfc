import { afterEach } from 'vitest'
import { cleanup } from '@testing-library/react'

afterEach(() => {
  cleanup()
  // node-environment suites have no storage
  if (typeof localStorage !== 'undefined') localStorage.clear()
})
