export { Extractor } from './extractor.js'
export { HttpFetcher } from './fetch/http-fetcher.js'
export {
  collectMetaTags,
  extractMetaTags,
  extractMetaTagsFromHtml,
  readMetaTag,
} from './extract/meta-extractor.js'
export { loadDocument } from './extract/html.js'
export {
  FetchFailedError,
  InvalidUrlError,
  isMetaExtractionError,
  MetaExtractionError,
  ParseFailedError,
  UnexpectedStatusError,
} from './errors.js'
export type { MetaErrorCode } from './errors.js'
export { isHttpUrl } from './utils/url.js'
export type {
  ByteSource,
  ExtractorOptions,
  FetchedPage,
  FetchOptions,
  MetaTag,
  Transport,
  TransportRequest,
} from './types.js'
