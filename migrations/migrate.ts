import knex from 'knex'
import config from './knexfile.js'

/**
 * Applies every pending migration using the development configuration.
 */
async function migrate() {
  const db = knex(config.development)

  try {
    const [batch, applied] = await db.migrate.latest()
    console.log(
      `Migrations completed successfully (batch ${batch}, ${applied.length} applied)`,
    )
  } catch (err) {
    console.error('Error running migrations:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await migrate()
