import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { removeTestDatabaseDir } from '../../helpers/test-db-dir.js'

describe('removeTestDatabaseDir', () => {
  it('should remove the directory with the database files in it', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'podsync-teardown-'))
    fs.writeFileSync(path.join(dir, '1234.db'), '')
    fs.writeFileSync(path.join(dir, '1234.db-wal'), '')

    removeTestDatabaseDir(dir)

    expect(fs.existsSync(dir)).toBe(false)
  })

  it('should do nothing when the directory is already gone', () => {
    const dir = path.join(os.tmpdir(), 'podsync-teardown-missing')

    expect(() => removeTestDatabaseDir(dir)).not.toThrow()
  })

  it('should load without the vitest runtime', () => {
    const source = fs.readFileSync(
      new URL('../../helpers/test-db-dir.ts', import.meta.url),
      'utf8',
    )
    const imports = [...source.matchAll(/from '([^']+)'/g)].map(
      (match) => match[1],
    )

    expect(imports).toEqual(['node:fs', 'node:os', 'node:path'])
  })
})
