/**
 * Error taxonomy for meta extraction.
 *
 * Every failure is thrown as a subclass of MetaExtractionError carrying a
 * stable `code`. Underlying causes are kept on `error.cause`. URLs on
 * errors have their userinfo stripped, since errors end up in logs.
 */

import { redactUrl } from '@metaget/logger'

export type MetaErrorCode = 'INVALID_URL' | 'FETCH_FAILED' | 'UNEXPECTED_STATUS' | 'PARSE_FAILED'

export class MetaExtractionError extends Error {
  readonly code: MetaErrorCode

  constructor(code: MetaErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'MetaExtractionError'
    this.code = code
  }
}

/** URL lacks an http:// or https:// prefix. Raised before any I/O. */
export class InvalidUrlError extends MetaExtractionError {
  readonly url: string

  constructor(url: string) {
    super('INVALID_URL', `invalid URL scheme: ${redactUrl(url)}`)
    this.name = 'InvalidUrlError'
    this.url = redactUrl(url)
  }
}

/** The transport rejected, timed out, or the body could not be read. */
export class FetchFailedError extends MetaExtractionError {
  readonly url: string

  constructor(url: string, cause: unknown) {
    super('FETCH_FAILED', `failed to fetch URL: ${describeCause(cause)}`, cause)
    this.name = 'FetchFailedError'
    this.url = redactUrl(url)
  }
}

export class UnexpectedStatusError extends MetaExtractionError {
  readonly url: string
  readonly statusCode: number

  constructor(url: string, statusCode: number) {
    super('UNEXPECTED_STATUS', `unexpected status code: ${statusCode}`)
    this.name = 'UnexpectedStatusError'
    this.url = redactUrl(url)
    this.statusCode = statusCode
  }
}

export class ParseFailedError extends MetaExtractionError {
  constructor(cause: unknown) {
    super('PARSE_FAILED', `failed to parse HTML: ${describeCause(cause)}`, cause)
    this.name = 'ParseFailedError'
  }
}

export function isMetaExtractionError(value: unknown): value is MetaExtractionError {
  return value instanceof MetaExtractionError
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
