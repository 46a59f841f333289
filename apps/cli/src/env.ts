/**
 * Environment loader - import before anything that reads process.env.
 *
 * Loads apps/cli/.env outside production; production shells inject
 * variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', '.env')
  config({ path: envPath })
}
