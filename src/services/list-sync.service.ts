/**
 * List Sync Service
 *
 * Caller-facing API over the list sync engine. Each call loads the list,
 * runs one engine operation on it, checks the result, and persists it.
 * Calls that target the same list run one at a time.
 */

import {
  InvariantViolationError,
  ListNotFoundError,
  NoClientStateError,
} from '@root/types/errors.js'
import type {
  ClientSyncStatus,
  CreateOrderedListInput,
  IdMappingService,
  InvariantViolation,
  ListItem,
  ListSyncDeps,
  ListSyncSettings,
  MediaClientType,
  NewListItem,
  OrderedList,
  ReconciliationResult,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  getClientSyncStatus,
  unlinkClient,
} from '@services/list-sync/client-state/client-state.js'
import {
  detectItemOrderConflicts,
  synchronizeWithClient,
} from '@services/list-sync/divergence/index.js'
import { generateSyncPayload } from '@services/list-sync/export/payload-generator.js'
import { createOrderedList } from '@services/list-sync/list-factory.js'
import { mergeLists } from '@services/list-sync/merge/list-merger.js'
import {
  addItem,
  removeItem,
  reorderItem,
} from '@services/list-sync/positions/index.js'
import {
  applyChangesFromMultipleClients,
  applyClientChanges,
} from '@services/list-sync/reconciliation/index.js'
import { validateItems } from '@services/list-sync/validation/list-validator.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'

export class ListSyncService {
  private readonly log: FastifyBaseLogger
  private readonly queues = new Map<number, LimitFunction>()

  /**
   * @param baseLog - Application logger
   * @param db - Persistence for lists
   * @param mappingService - Translates item ids to and from client ids
   * @param settings - Engine settings
   */
  constructor(
    baseLog: FastifyBaseLogger,
    private readonly db: DatabaseService,
    private readonly mappingService: IdMappingService,
    private readonly settings: ListSyncSettings,
  ) {
    this.log = createServiceLogger(baseLog, 'LIST_SYNC')
  }

  private get deps(): ListSyncDeps {
    return { logger: this.log, config: this.settings }
  }

  //=============================================================================
  // LISTS
  //=============================================================================

  async createList(input: CreateOrderedListInput): Promise<OrderedList> {
    const list = await this.db.createOrderedList(createOrderedList(input))
    this.log.info(
      { listId: list.id, ownerId: list.ownerId, listType: list.listType },
      'Created list',
    )
    return list
  }

  /**
   * @throws ListNotFoundError when the list does not exist
   */
  async getList(listId: number): Promise<OrderedList> {
    return this.load(listId)
  }

  async getListsByOwner(ownerId: number): Promise<OrderedList[]> {
    return this.db.getOrderedListsByOwner(ownerId)
  }

  async deleteList(listId: number): Promise<boolean> {
    return this.withListLock(listId, async () => {
      const deleted = await this.db.deleteOrderedList(listId)
      if (deleted) {
        this.log.info({ listId }, 'Deleted list')
      }
      return deleted
    })
  }

  /**
   * Stores a new list holding the items of `primaryId` followed by the items
   * of `secondaryId` it lacks. Neither source list changes. The new list has
   * no client states.
   */
  async mergeLists(
    primaryId: number,
    secondaryId: number,
    actorId: number,
  ): Promise<OrderedList> {
    const [primary, secondary] = await Promise.all([
      this.load(primaryId),
      this.load(secondaryId),
    ])

    const merged = mergeLists(primary, secondary)
    merged.syncStates.clear()
    merged.originClientId = 0
    merged.lastSynced = null
    merged.modifiedBy = actorId
    this.assertValid(merged)

    const stored = await this.db.createOrderedList(merged)
    this.log.info(
      {
        listId: stored.id,
        primaryId,
        secondaryId,
        itemCount: stored.itemCount,
      },
      'Merged lists',
    )
    return stored
  }

  /**
   * @returns Every invariant the stored list breaks; empty when consistent
   */
  async validateList(listId: number): Promise<InvariantViolation[]> {
    return validateItems(await this.load(listId))
  }

  //=============================================================================
  // ITEMS
  //=============================================================================

  async addItem(
    listId: number,
    item: NewListItem,
    actorId: number,
  ): Promise<ListItem> {
    return this.mutate(listId, (list) =>
      addItem(list, item, actorId, this.settings.changeHistoryLimit),
    )
  }

  async removeItem(
    listId: number,
    itemId: number,
    actorId: number,
  ): Promise<ListItem> {
    return this.mutate(listId, (list) =>
      removeItem(list, itemId, actorId, this.settings.changeHistoryLimit),
    )
  }

  async reorderItem(
    listId: number,
    itemId: number,
    newPosition: number,
    actorId: number,
  ): Promise<boolean> {
    return this.mutate(listId, (list) =>
      reorderItem(
        list,
        itemId,
        newPosition,
        actorId,
        this.settings.changeHistoryLimit,
      ),
    )
  }

  //=============================================================================
  // CLIENT SYNC
  //=============================================================================

  /**
   * Builds the payload to send to a client and records it as the client's
   * baseline.
   */
  async exportToClient(
    listId: number,
    clientId: number,
    serviceKind: MediaClientType,
    externalListId?: string,
  ): Promise<SyncListItem[]> {
    return this.mutate(listId, (list) =>
      generateSyncPayload(
        list,
        clientId,
        this.mappingService,
        serviceKind,
        this.deps,
        externalListId,
      ),
    )
  }

  async applyClientChanges(
    listId: number,
    clientId: number,
    items: SyncListItem[],
    serviceKind: MediaClientType,
    externalListId?: string,
  ): Promise<ReconciliationResult> {
    return this.mutate(listId, (list) =>
      applyClientChanges(
        list,
        clientId,
        items,
        this.mappingService,
        serviceKind,
        this.deps,
        externalListId,
      ),
    )
  }

  async applyChangesFromMultipleClients(
    listId: number,
    changesByClient: Map<number, SyncListItem[]>,
    serviceKind: MediaClientType,
  ): Promise<ReconciliationResult> {
    return this.mutate(listId, (list) =>
      applyChangesFromMultipleClients(
        list,
        changesByClient,
        this.mappingService,
        serviceKind,
        this.deps,
      ),
    )
  }

  /**
   * @returns Whether the list had diverged from the client's stored state
   */
  async synchronizeWithClient(
    listId: number,
    clientId: number,
    serviceKind: MediaClientType,
  ): Promise<boolean> {
    return this.mutate(listId, (list) =>
      synchronizeWithClient(
        list,
        clientId,
        this.mappingService,
        serviceKind,
        this.deps,
      ),
    )
  }

  /**
   * Native ids in the client's stored state whose position differs from the
   * list's.
   *
   * @throws NoClientStateError when the client has no stored state
   */
  async detectItemOrderConflicts(
    listId: number,
    clientId: number,
    serviceKind: MediaClientType,
  ): Promise<Set<string>> {
    const list = await this.load(listId)
    const state = list.syncStates.get(clientId)
    if (!state) {
      throw new NoClientStateError(listId, clientId)
    }
    return detectItemOrderConflicts(
      list,
      state,
      this.mappingService,
      serviceKind,
      this.deps,
    )
  }

  async unlinkClient(listId: number, clientId: number): Promise<boolean> {
    return this.mutate(listId, (list) => {
      const removed = unlinkClient(list, clientId)
      if (removed) {
        this.log.info({ listId, clientId }, 'Unlinked client from list')
      }
      return removed
    })
  }

  async getSyncStatus(
    listId: number,
    clientId: number,
  ): Promise<ClientSyncStatus> {
    return getClientSyncStatus(await this.load(listId), clientId)
  }

  //=============================================================================
  // INTERNALS
  //=============================================================================

  private async load(listId: number): Promise<OrderedList> {
    const list = await this.db.getOrderedList(listId)
    if (!list) {
      throw new ListNotFoundError(listId)
    }
    return list
  }

  private assertValid(list: OrderedList): void {
    const violations = validateItems(list)
    if (violations.length > 0) {
      this.log.error(
        { listId: list.id, violations },
        'Refusing to persist inconsistent list',
      )
      throw new InvariantViolationError(list.id, violations)
    }
  }

  /**
   * Runs an operation against a freshly loaded copy of the list and saves
   * the copy only if the operation succeeds and leaves it consistent.
   */
  private async mutate<T>(
    listId: number,
    operation: (list: OrderedList) => T | Promise<T>,
  ): Promise<T> {
    return this.withListLock(listId, async () => {
      const list = await this.load(listId)
      const result = await operation(list)
      this.assertValid(list)
      await this.db.saveOrderedList(list)
      return result
    })
  }

  private async withListLock<T>(
    listId: number,
    task: () => Promise<T>,
  ): Promise<T> {
    let limit = this.queues.get(listId)
    if (!limit) {
      limit = pLimit(1)
      this.queues.set(listId, limit)
    }

    try {
      return await limit(task)
    } finally {
      if (limit.activeCount === 0 && limit.pendingCount === 0) {
        this.queues.delete(listId)
      }
    }
  }
}
