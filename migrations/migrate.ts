import knex from 'knex'
import config from './knexfile.js'

/**
 * Applies all pending migrations and closes the connection, exiting non-zero
 * on failure.
 */
async function migrate() {
  const db = knex(config.development)

  try {
    const [batch, applied] = await db.migrate.latest()
    console.log(
      applied.length > 0
        ? `Applied batch ${batch}: ${applied.join(', ')}`
        : 'Database already up to date',
    )
  } catch (err) {
    console.error('Error running migrations:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await migrate()
