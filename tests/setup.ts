import { beforeEach, afterEach, vi } from 'vitest'

// The logger writes JSON lines to the console; keep test output readable.
// Tests that assert on log output read these spies via vi.mocked(console.warn).
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  vi.useRealTimers()
})
