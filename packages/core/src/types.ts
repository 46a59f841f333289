/**
 * Core types shared by the fetcher, the meta traversal and the Extractor facade.
 */

import type { ReadableStream } from 'node:stream/web'
import type { ILogger } from '@metaget/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction output
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One `<meta>` declaration. `name` comes from whichever of the `name` or
 * `property` attributes appeared last on the tag.
 *
 * Both fields are always non-empty; tags missing either are skipped.
 */
export interface MetaTag {
  readonly name: string
  readonly content: string
}

/**
 * Anything the extractor can drain into bytes.
 * Strings are taken as already-decoded markup.
 */
export type ByteSource =
  | string
  | Uint8Array
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array>

// ═══════════════════════════════════════════════════════════════════════════════
// Transport
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Request options handed to the transport. Only what a plain GET needs;
 * no headers are set.
 */
export interface TransportRequest {
  method: 'GET'
  redirect: 'follow'
  signal?: AbortSignal
}

/**
 * Performs the HTTP exchange. Defaults to Node's global `fetch`; tests and
 * callers needing proxies or custom TLS inject their own.
 */
export type Transport = (url: string, init: TransportRequest) => Promise<Response>

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch output
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchedPage {
  /** URL as requested (before any redirect the transport followed) */
  url: string

  /** Always 200; anything else is an UnexpectedStatusError */
  statusCode: number

  /** Fully read response body */
  body: Uint8Array

  durationMs: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchOptions {
  /** Custom transport. Default: global fetch */
  transport?: Transport

  /** Abort the request after this many milliseconds. Default: no timeout */
  timeoutMs?: number

  logger?: ILogger
}

export type ExtractorOptions = FetchOptions
