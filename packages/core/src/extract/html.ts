import * as cheerio from 'cheerio'
import type { Document } from 'domhandler'
import { decodeUtf8 } from '../utils/bytes.js'

/**
 * Parse markup into a domhandler tree using cheerio's parse5 backend.
 * Bytes are decoded as UTF-8 without charset sniffing.
 */
export function loadDocument(payload: Uint8Array | string): Document {
  const html = typeof payload === 'string' ? payload : decodeUtf8(payload)
  return cheerio.load(html).root()[0]
}
