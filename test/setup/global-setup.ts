/**
 * Global test setup and teardown
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3006'
  // Tests trigger passes themselves
  process.env.syncIntervalMinutes = '0'
}

export async function teardown(): Promise<void> {
  try {
    // Workers have exited and closed their connections by now
    const { removeTestDatabaseDir } = await import('../helpers/test-db-dir.js')
    removeTestDatabaseDir()
  } catch (error) {
    console.error('Failed to cleanup test database:', error)
  }
}
