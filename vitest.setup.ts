import { afterEach, beforeEach, vi } from 'vitest'

// Tests never reach the network: anything that falls through to the global
// fetch fails loudly. Tests that exercise the default transport stub fetch
// themselves.
async function blockedFetch(): Promise<Response> {
  throw new Error('Outbound network is disabled in tests')
}

beforeEach(() => {
  vi.stubGlobal('fetch', blockedFetch)
})

afterEach(() => {
  vi.unstubAllGlobals()
})
