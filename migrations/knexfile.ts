import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import dotenv from 'dotenv'
import type { Knex } from 'knex'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..')

// Load environment variables before anything else
dotenv.config({ path: resolve(projectRoot, '.env') })

function ensureDbDirectory(): string {
  const dbDirectory = resolve(projectRoot, 'data', 'db')
  if (!fs.existsSync(dbDirectory)) {
    fs.mkdirSync(dbDirectory, { recursive: true })
  }
  return dbDirectory
}

const config: Record<string, Knex.Config> = {
  development: {
    client: 'better-sqlite3',
    connection: {
      filename:
        process.env.dbPath ?? resolve(ensureDbDirectory(), 'medialist-sync.db'),
    },
    useNullAsDefault: true,
    migrations: {
      directory: resolve(__dirname, 'migrations'),
    },
    pool: {
      afterCreate: (
        conn: { exec: (sql: string) => void },
        cb: () => void,
      ): void => {
        conn.exec('PRAGMA journal_mode = WAL;')
        cb()
      },
    },
  },
}

export default config
