/**
 * Meta tag extraction
 *
 * Walks a parsed document depth-first, pre-order, and collects one MetaTag
 * per `<meta>` element that ends up with both a name and a content value.
 *
 * Attribute rule: `name` and `property` share one slot and `content` has its
 * own; each is overwritten by the last matching attribute in the tag's
 * attribute order. `<meta content="x" property="og:a" name="a">` therefore
 * yields name "a", and swapping the last two attributes yields "og:a".
 */

import type { AnyNode, Element } from 'domhandler'
import { hasChildren, isTag } from 'domhandler'
import { ParseFailedError } from '../errors.js'
import type { ByteSource, MetaTag } from '../types.js'
import { readBytes } from '../utils/bytes.js'
import { loadDocument } from './html.js'

/**
 * Read a meta declaration off one element, or null when it lacks a name or content.
 */
export function readMetaTag(element: Element): MetaTag | null {
  let name = ''
  let content = ''

  for (const [key, value] of Object.entries(element.attribs)) {
    switch (key) {
      case 'name':
      case 'property':
        name = value
        break
      case 'content':
        content = value
        break
    }
  }

  if (name === '' || content === '') {
    return null
  }
  return Object.freeze({ name, content })
}

/**
 * Collect meta tags from a tree in document order. The tree is not modified.
 */
export function collectMetaTags(root: AnyNode): MetaTag[] {
  const tags: MetaTag[] = []
  // Explicit stack instead of recursion so deeply nested markup cannot
  // exhaust the call stack.
  const stack: AnyNode[] = [root]

  while (stack.length > 0) {
    const node = stack.pop()
    if (!node) break

    if (isTag(node) && node.name === 'meta') {
      const tag = readMetaTag(node)
      if (tag) {
        tags.push(tag)
      }
    }

    if (hasChildren(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i])
      }
    }
  }

  return tags
}

/**
 * Extract meta tags from already-decoded markup.
 *
 * @throws ParseFailedError if the parser throws
 */
export function extractMetaTagsFromHtml(html: string): MetaTag[] {
  let root: AnyNode
  try {
    root = loadDocument(html)
  } catch (error) {
    throw new ParseFailedError(error)
  }
  return collectMetaTags(root)
}

/**
 * Drain a byte source, parse it, and extract meta tags.
 *
 * @throws ParseFailedError if the source fails mid-read or the parser throws
 */
export async function extractMetaTags(source: ByteSource): Promise<MetaTag[]> {
  let root: AnyNode
  try {
    root = loadDocument(await readBytes(source))
  } catch (error) {
    throw new ParseFailedError(error)
  }
  return collectMetaTags(root)
}
