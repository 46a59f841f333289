/**
 * Extractor
 *
 * Fetches a page and returns its meta tags. Instances hold read-only
 * configuration only, so concurrent calls do not interact.
 */

import { createLogger, redactUrl, type ILogger } from '@metaget/logger'
import { isMetaExtractionError } from './errors.js'
import { extractMetaTags } from './extract/meta-extractor.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import type { ExtractorOptions, MetaTag } from './types.js'

export class Extractor {
  private readonly fetcher: HttpFetcher
  private readonly log: ILogger

  constructor(options: ExtractorOptions = {}) {
    this.log = options.logger ?? createLogger('metaget').child('extractor')
    this.fetcher = new HttpFetcher({
      transport: options.transport,
      timeoutMs: options.timeoutMs,
      logger: this.log.child('fetch'),
    })
  }

  /**
   * Fetch `url` and extract its meta tags in document order.
   * Throws a MetaExtractionError subclass on failure; there are no partial results.
   */
  async extract(url: string): Promise<MetaTag[]> {
    const startTime = Date.now()

    try {
      const page = await this.fetcher.fetch(url)
      const tags = await extractMetaTags(page.body)

      this.log.info('extracted meta tags', {
        url: redactUrl(url),
        count: tags.length,
        durationMs: Date.now() - startTime,
      })
      return tags
    } catch (error) {
      this.log.warn(
        'meta extraction failed',
        {
          url: redactUrl(url),
          code: isMetaExtractionError(error) ? error.code : 'UNKNOWN',
          durationMs: Date.now() - startTime,
        },
        error
      )
      throw error
    }
  }
}
