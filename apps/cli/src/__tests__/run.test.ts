import { describe, expect, it, vi } from 'vitest'
import { Extractor, FetchFailedError, type ExtractorOptions, type MetaTag } from '@metaget/core'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli, USAGE } from '../run.js'

function createDeps(extract: (url: string) => Promise<MetaTag[]>) {
  const stdout = vi.fn((_text: string) => {})
  const stderr = vi.fn((_text: string) => {})
  const createExtractor = vi.fn((_options: ExtractorOptions) => ({ extract }))
  return { stdout, stderr, createExtractor }
}

describe('runCli', () => {
  it('prints tags and exits 0', async () => {
    const deps = createDeps(async () => [{ name: 'description', content: 'A test page' }])

    const code = await runCli(['https://example.com'], {}, deps)

    expect(code).toBe(EXIT_OK)
    expect(deps.stdout).toHaveBeenCalledWith('description\tA test page')
    expect(deps.stderr).not.toHaveBeenCalled()
  })

  it('passes the configured timeout to the extractor', async () => {
    const deps = createDeps(async () => [])

    await runCli(['https://example.com', '--timeout-ms', '750'], {}, deps)

    expect(deps.createExtractor).toHaveBeenCalledWith({ timeoutMs: 750 })
  })

  it('prints nothing in text mode when the page has no tags', async () => {
    const deps = createDeps(async () => [])

    await expect(runCli(['https://example.com'], {}, deps)).resolves.toBe(EXIT_OK)
    expect(deps.stdout).not.toHaveBeenCalled()
  })

  it('prints an empty JSON array in json mode', async () => {
    const deps = createDeps(async () => [])

    await runCli(['https://example.com', '--format', 'json'], {}, deps)

    expect(deps.stdout).toHaveBeenCalledWith('[]')
  })

  it('shows usage for --help without extracting', async () => {
    const deps = createDeps(async () => [])

    await expect(runCli(['--help'], {}, deps)).resolves.toBe(EXIT_OK)
    expect(deps.stdout).toHaveBeenCalledWith(USAGE)
    expect(deps.createExtractor).not.toHaveBeenCalled()
  })

  it('exits 2 on usage errors', async () => {
    const deps = createDeps(async () => [])

    await expect(runCli([], {}, deps)).resolves.toBe(EXIT_USAGE)
    expect(deps.stderr).toHaveBeenNthCalledWith(1, 'Missing <url> argument')
    expect(deps.stderr).toHaveBeenNthCalledWith(2, USAGE)
  })

  it('exits 1 with the error message when extraction fails', async () => {
    const deps = createDeps(async url => {
      throw new FetchFailedError(url, new Error('connect ECONNREFUSED 127.0.0.1:80'))
    })

    await expect(runCli(['http://localhost/'], {}, deps)).resolves.toBe(EXIT_FAILURE)
    expect(deps.stderr).toHaveBeenCalledWith('metaget: failed to fetch URL: connect ECONNREFUSED 127.0.0.1:80')
    expect(deps.stdout).not.toHaveBeenCalled()
  })

  it('reports invalid schemes through the real extractor without network access', async () => {
    const transport = vi.fn(async () => new Response('', { status: 200 }))
    const stdout = vi.fn((_text: string) => {})
    const stderr = vi.fn((_text: string) => {})
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(), child: vi.fn() }
    logger.child.mockReturnValue(logger)

    const code = await runCli(['ftp://example.com'], {}, {
      createExtractor: options => new Extractor({ ...options, transport, logger }),
      stdout,
      stderr,
    })

    expect(code).toBe(EXIT_FAILURE)
    expect(stderr).toHaveBeenCalledWith('metaget: invalid URL scheme: ftp://example.com')
    expect(transport).not.toHaveBeenCalled()
  })
})
