/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/harvester/.env.local outside production. Production injects
 * env vars directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
