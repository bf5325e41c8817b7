/**
 * Database Service
 *
 * Persistence boundary for ordered lists and item id mappings, backed by
 * better-sqlite3 through Knex. Exposed to the application via the 'database'
 * Fastify plugin as `fastify.db`.
 *
 * Responsible for:
 * - Storing each ordered list as one serialized document
 * - Looking up lists by id and by owner
 * - Storing the mapping between internal item ids and each client's native ids
 */
import type { Config } from '@root/types/config.types.js'
import type {
  MediaClientType,
  OrderedList,
} from '@root/types/list-sync.types.js'
import {
  deserializeOrderedList,
  serializeOrderedList,
} from '@services/list-sync/persistence/list-serde.js'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'

interface OrderedListRow {
  id: number
  owner_id: number
  list_type: string
  title: string
  document: string
  created_at: string
  updated_at: string
}

interface IdMappingRow {
  id: number
  internal_id: number
  service_kind: string
  external_id: string
  created_at: string
}

export class DatabaseService {
  private readonly knex: Knex

  /**
   * @param log - Logger for database operations
   * @param config - Configuration holding the SQLite file path
   */
  constructor(
    private readonly log: FastifyBaseLogger,
    config: Pick<Config, 'dbPath'>,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(config.dbPath, log))
  }

  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  private get timestamp(): string {
    return new Date().toISOString()
  }

  /**
   * Closes the database connection
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  //=============================================================================
  // ORDERED LISTS
  //=============================================================================

  /**
   * Stores a new list and assigns its id
   *
   * @param list - List to store; its `id` is overwritten with the new row id
   * @returns The stored list
   */
  async createOrderedList(list: OrderedList): Promise<OrderedList> {
    return this.knex.transaction(async (trx) => {
      const result = await trx<OrderedListRow>('ordered_lists')
        .insert({
          owner_id: list.ownerId,
          list_type: list.listType,
          title: list.details.title,
          document: '{}',
          created_at: this.timestamp,
          updated_at: this.timestamp,
        })
        .returning('id')

      // Handle both array of values and array of objects
      const first: unknown = result[0]
      const id =
        typeof first === 'object' && first !== null && 'id' in first
          ? Number(first.id)
          : Number(first)

      if (!Number.isInteger(id) || id <= 0) {
        throw new Error('Failed to create ordered list')
      }

      list.id = id
      await trx<OrderedListRow>('ordered_lists')
        .where({ id })
        .update({ document: serializeOrderedList(list) })

      this.log.debug({ listId: id, ownerId: list.ownerId }, 'Created list')
      return list
    })
  }

  /**
   * Retrieves a list by id
   *
   * @returns The list, or undefined when no row exists
   */
  async getOrderedList(id: number): Promise<OrderedList | undefined> {
    const row = await this.knex<OrderedListRow>('ordered_lists')
      .where({ id })
      .first()
    if (!row) return undefined
    return deserializeOrderedList(row.document)
  }

  /**
   * Retrieves every list owned by a user, oldest first
   */
  async getOrderedListsByOwner(ownerId: number): Promise<OrderedList[]> {
    const rows = await this.knex<OrderedListRow>('ordered_lists')
      .where({ owner_id: ownerId })
      .orderBy('id', 'asc')
    return rows.map((row) => deserializeOrderedList(row.document))
  }

  /**
   * Overwrites the stored document of an existing list
   *
   * @returns Whether a row was updated
   */
  async saveOrderedList(list: OrderedList): Promise<boolean> {
    const updated = await this.knex<OrderedListRow>('ordered_lists')
      .where({ id: list.id })
      .update({
        owner_id: list.ownerId,
        list_type: list.listType,
        title: list.details.title,
        document: serializeOrderedList(list),
        updated_at: this.timestamp,
      })
    return updated > 0
  }

  /**
   * @returns Whether a row was deleted
   */
  async deleteOrderedList(id: number): Promise<boolean> {
    const deleted = await this.knex<OrderedListRow>('ordered_lists')
      .where({ id })
      .delete()
    return deleted > 0
  }

  //=============================================================================
  // ID MAPPINGS
  //=============================================================================

  /**
   * Records that an internal item is known to a client service under a native
   * id. Replaces any mapping that used either side of the pair.
   */
  async upsertIdMapping(
    internalId: number,
    serviceKind: MediaClientType,
    externalId: string,
  ): Promise<void> {
    await this.knex.transaction(async (trx) => {
      await trx<IdMappingRow>('id_mappings')
        .where({ service_kind: serviceKind })
        .andWhere((builder) => {
          builder
            .where({ internal_id: internalId })
            .orWhere({ external_id: externalId })
        })
        .delete()

      await trx<IdMappingRow>('id_mappings').insert({
        internal_id: internalId,
        service_kind: serviceKind,
        external_id: externalId,
        created_at: this.timestamp,
      })
    })
  }

  async getInternalIdForExternal(
    externalId: string,
    serviceKind: MediaClientType,
  ): Promise<number | undefined> {
    const row = await this.knex<IdMappingRow>('id_mappings')
      .where({ external_id: externalId, service_kind: serviceKind })
      .first()
    return row ? Number(row.internal_id) : undefined
  }

  async getExternalIdForInternal(
    internalId: number,
    serviceKind: MediaClientType,
  ): Promise<string | undefined> {
    const row = await this.knex<IdMappingRow>('id_mappings')
      .where({ internal_id: internalId, service_kind: serviceKind })
      .first()
    return row ? row.external_id : undefined
  }
}
