import type { ReadableStream } from 'node:stream/web'
import type { ByteSource } from '../types.js'

const EMPTY = new Uint8Array(0)

/**
 * Drain a byte source into a single buffer.
 *
 * Web streams are read through a reader that is cancelled if reading stops
 * early and always unlocked. Errors raised by the source propagate as-is.
 */
export async function readBytes(source: ByteSource | null): Promise<Uint8Array> {
  if (source === null) {
    return EMPTY
  }
  if (typeof source === 'string') {
    return new TextEncoder().encode(source)
  }
  if (source instanceof Uint8Array) {
    return source
  }
  if (isWebStream(source)) {
    return readWebStream(source)
  }

  const chunks: Uint8Array[] = []
  for await (const chunk of source) {
    chunks.push(chunk)
  }
  return Buffer.concat(chunks)
}

/** UTF-8 decode; invalid sequences become U+FFFD. */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8').decode(bytes)
}

function isWebStream(source: ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>): source is ReadableStream<Uint8Array> {
  return 'getReader' in source && typeof source.getReader === 'function'
}

async function readWebStream(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader()
  const chunks: Uint8Array[] = []
  let finished = false

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break
      chunks.push(value)
    }
    finished = true
    return Buffer.concat(chunks)
  } finally {
    if (!finished) {
      // cancel() rejects with the stored error once the stream has errored;
      // the read error is the one the caller sees.
      await reader.cancel().then(
        () => undefined,
        () => undefined
      )
    }
    reader.releaseLock()
  }
}
