/**
 * URL scheme guard.
 *
 * The prefix check is literal and case-sensitive: `HTTP://example.com`,
 * relative paths, `ftp://` and the empty string are all rejected.
 */

import { InvalidUrlError } from '../errors.js'

const ALLOWED_PREFIXES = ['http://', 'https://'] as const

export function isHttpUrl(url: string): boolean {
  return ALLOWED_PREFIXES.some(prefix => url.startsWith(prefix))
}

/**
 * @throws InvalidUrlError when the URL does not start with http:// or https://
 */
export function assertHttpUrl(url: string): void {
  if (!isHttpUrl(url)) {
    throw new InvalidUrlError(url)
  }
}
