import type { MetaTag } from '@metaget/core'
import type { OutputFormat } from './config.js'

/**
 * Render tags for stdout. Text mode prints `name<TAB>content` per line;
 * JSON mode prints an indented array.
 */
export function formatTags(tags: readonly MetaTag[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      tags.map(({ name, content }) => ({ name, content })),
      null,
      2
    )
  }
  return tags.map(tag => `${tag.name}\t${tag.content}`).join('\n')
}
