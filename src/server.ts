import { createLoggerConfig, validLogLevels } from '@utils/logger.js'
import Fastify, { type FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import serviceApp from './app.js'

/**
 * Builds a ready Fastify instance carrying `config`, `db`, `idMapping` and
 * `listSync`, logging through the terminal and rotating log files.
 *
 * The database must already be migrated (`npm run migrate`).
 */
export async function createApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const level = validLogLevels.find((valid) => valid === app.config.logLevel)
  if (level) {
    app.log.level = level
  }

  return app
}
