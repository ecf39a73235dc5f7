import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type Database from 'better-sqlite3'
import dotenv from 'dotenv'
import type { Knex } from 'knex'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
// migrations/ in development, dist/migrations/ once built
const projectRoot = resolve(
  __dirname,
  __dirname.split(/[\\/]/).includes('dist') ? '../..' : '..',
)

// Load environment variables before anything else
dotenv.config({ path: resolve(projectRoot, '.env') })

function ensureDbFile(): string {
  const dbFile = resolve(
    projectRoot,
    process.env.dbPath || './data/db/podsync.db',
  )
  try {
    fs.mkdirSync(dirname(dbFile), { recursive: true })
    return dbFile
  } catch (err) {
    console.error('Failed to create database directory:', err)
    process.exit(1)
  }
}

const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'better-sqlite3',
    connection: {
      filename: ensureDbFile(),
    },
    useNullAsDefault: true,
    migrations: {
      directory: resolve(__dirname, 'migrations'),
    },
    pool: {
      afterCreate: (
        conn: Database.Database,
        cb: (err: Error | null, conn: Database.Database) => void,
      ) => {
        conn.pragma('journal_mode = WAL')
        conn.pragma('foreign_keys = ON')
        cb(null, conn)
      },
    },
  },
}

export default config
