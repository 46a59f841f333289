/**
 * HTTP Fetcher
 *
 * One GET per call through an injectable transport (global fetch by default).
 * Only status 200 is accepted. No retries, no custom headers.
 *
 * The response body is released on every path: drained on success,
 * cancelled on a non-200 status or a failed read.
 */

import { createLogger, redactUrl, type ILogger } from '@metaget/logger'
import { FetchFailedError, UnexpectedStatusError } from '../errors.js'
import type { FetchedPage, FetchOptions, Transport, TransportRequest } from '../types.js'
import { readBytes } from '../utils/bytes.js'
import { assertHttpUrl } from '../utils/url.js'

const defaultTransport: Transport = (url, init) => fetch(url, init)

export class HttpFetcher {
  private readonly transport: Transport
  private readonly timeoutMs?: number
  private readonly log: ILogger

  constructor(options: FetchOptions = {}) {
    this.transport = options.transport ?? defaultTransport
    this.timeoutMs = options.timeoutMs
    this.log = options.logger ?? createLogger('metaget').child('fetch')
  }

  /**
   * Fetch a page and return its body.
   *
   * @throws InvalidUrlError before any I/O when the scheme is not http(s)
   * @throws FetchFailedError when the transport rejects, times out or the body read fails
   * @throws UnexpectedStatusError for any status other than 200
   */
  async fetch(url: string): Promise<FetchedPage> {
    assertHttpUrl(url)

    const startTime = Date.now()
    const logUrl = redactUrl(url)
    const controller = this.timeoutMs !== undefined ? new AbortController() : null
    const timeoutId = controller ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined

    const init: TransportRequest = { method: 'GET', redirect: 'follow' }
    if (controller) {
      init.signal = controller.signal
    }

    this.log.debug('fetching page', { url: logUrl, timeoutMs: this.timeoutMs })

    try {
      let response: Response
      try {
        response = await this.transport(url, init)
      } catch (error) {
        throw new FetchFailedError(url, error)
      }

      if (response.status !== 200) {
        await this.discardBody(response, logUrl)
        throw new UnexpectedStatusError(url, response.status)
      }

      let body: Uint8Array
      try {
        body = await readBytes(response.body)
      } catch (error) {
        throw new FetchFailedError(url, error)
      }

      const durationMs = Date.now() - startTime
      this.log.debug('page fetched', {
        url: logUrl,
        statusCode: response.status,
        bytes: body.byteLength,
        durationMs,
      })

      return {
        url,
        statusCode: response.status,
        body,
        durationMs,
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private async discardBody(response: Response, logUrl: string): Promise<void> {
    if (!response.body) return
    try {
      await response.body.cancel()
    } catch (error) {
      this.log.debug('response body already closed', {
        url: logUrl,
        reason: error instanceof Error ? error.message : String(error),
      })
    }
  }
}
