/**
 * Environment loader - import first, before any module that reads process.env.
 *
 * Loads apps/harvester/.env.local in development only; production deployments
 * inject variables directly.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
