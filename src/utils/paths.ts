import { basename, dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

// src/utils in development, dist/src/utils once built
const sourceRoot = resolve(__dirname, '..', '..')
export const projectRoot =
  basename(sourceRoot) === 'dist' ? dirname(sourceRoot) : sourceRoot

/**
 * Resolves the data directory.
 *
 * process.env.dataDir overrides the default of {projectRoot}/data.
 */
export function resolveDataDir(): string {
  return process.env.dataDir
    ? resolve(process.env.dataDir)
    : resolve(projectRoot, 'data')
}

export function resolveLogPath(): string {
  return resolve(resolveDataDir(), 'logs')
}

/**
 * Resolves a configured database path against the project root.
 */
export function resolveDbFile(dbPath: string): string {
  return resolve(projectRoot, dbPath)
}
