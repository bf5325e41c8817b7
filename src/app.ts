import database from '@plugins/custom/database.js'
import listSync from '@plugins/custom/list-sync.js'
import env from '@plugins/external/env.js'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

/**
 * Registers configuration, persistence and the list sync service on the
 * Fastify instance.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions,
) {
  await fastify.register(env)
  await fastify.register(database)
  await fastify.register(listSync)
}
