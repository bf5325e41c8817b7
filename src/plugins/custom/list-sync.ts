/**
 * List Sync Plugin
 *
 * Registers the database-backed id mapping and the ListSyncService that
 * request handlers and sync jobs call.
 */

import { ListSyncConfigSchema } from '@schemas/list-sync/list-sync-config.schema.js'
import { DatabaseIdMappingService } from '@services/id-mapping.service.js'
import { ListSyncService } from '@services/list-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    idMapping: DatabaseIdMappingService
    listSync: ListSyncService
  }
}

export default fp(
  async function listSync(fastify: FastifyInstance) {
    const settings = ListSyncConfigSchema.parse({
      changeHistoryLimit: fastify.config.changeHistoryLimit,
      mappingConcurrency: fastify.config.mappingConcurrency,
    })

    const idMapping = new DatabaseIdMappingService(fastify.db)
    const listSyncService = new ListSyncService(
      fastify.log,
      fastify.db,
      idMapping,
      settings,
    )

    fastify.decorate('idMapping', idMapping)
    fastify.decorate('listSync', listSyncService)
  },
  {
    name: 'list-sync',
    dependencies: ['config', 'database'],
  },
)
