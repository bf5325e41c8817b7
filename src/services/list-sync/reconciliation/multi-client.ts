/**
 * Multi-Client Reconciliation
 *
 * Merges several clients' snapshots in one pass. For each item the entry with
 * the latest timestamp across all clients wins. This pass only adds and
 * moves items; it never removes an item that some client stopped reporting.
 */

import type {
  IdMappingService,
  ListSyncDeps,
  MappedIncomingItem,
  MediaClientType,
  OrderedList,
  ReconciliationResult,
  SyncListItem,
} from '@root/types/list-sync.types.js'
import {
  parseSyncSnapshot,
  replaceClientState,
} from '../client-state/client-state.js'
import { mapIncomingItems } from '../mapping/incoming-mapper.js'
import { applyEntries, settlePositions } from './entry-applier.js'
import { selectWinningEntries } from './winner-selection.js'

/**
 * Reconciles snapshots from several clients into the canonical list.
 *
 * @param list - Canonical list, modified in place
 * @param changesByClient - Each client's snapshot, keyed by client id
 * @param mappingService - Id translation collaborator
 * @param serviceKind - Id space of the native ids
 * @param deps - Logger and settings
 * @returns Counts of what changed and the native ids that were dropped
 * @throws InvalidSnapshotError when any snapshot holds items that cannot be stored
 */
export async function applyChangesFromMultipleClients(
  list: OrderedList,
  changesByClient: Map<number, SyncListItem[]>,
  mappingService: IdMappingService,
  serviceKind: MediaClientType,
  deps: ListSyncDeps,
): Promise<ReconciliationResult> {
  const allEntries: MappedIncomingItem[] = []
  const dropped: string[] = []

  // Ascending client id keeps the pass reproducible regardless of map order
  const clientIds = [...changesByClient.keys()].sort((a, b) => a - b)
  const snapshots = new Map<number, SyncListItem[]>()
  for (const clientId of clientIds) {
    snapshots.set(
      clientId,
      parseSyncSnapshot(clientId, changesByClient.get(clientId) ?? []),
    )
  }

  for (const clientId of clientIds) {
    const batch = await mapIncomingItems(
      clientId,
      snapshots.get(clientId) ?? [],
      mappingService,
      serviceKind,
      deps,
    )
    allEntries.push(...batch.items)
    dropped.push(...batch.dropped)
  }

  const winners = selectWinningEntries(allEntries)
  const outcome = applyEntries(
    list,
    winners,
    deps.config.changeHistoryLimit,
  )

  settlePositions(list, outcome.ranks)

  const now = new Date()
  for (const clientId of clientIds) {
    replaceClientState(list, clientId, snapshots.get(clientId) ?? [], now)
  }
  list.lastSynced = now

  const changed = outcome.added + outcome.updated > 0
  if (changed) {
    list.lastModified = now
    if (outcome.latest) {
      list.modifiedBy = outcome.latest.clientId
    }
  }

  deps.logger.debug(
    {
      listId: list.id,
      clientCount: clientIds.length,
      serviceKind,
      added: outcome.added,
      updated: outcome.updated,
      dropped: dropped.length,
    },
    'Applied changes from multiple clients to list',
  )

  return {
    added: outcome.added,
    updated: outcome.updated,
    removed: 0,
    dropped,
    changed,
  }
}
